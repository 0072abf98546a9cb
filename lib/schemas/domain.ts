/**
 * Field limits and shared value schemas for the recipe domain.
 */

import * as z from "zod";

export const EMAIL_MAX_LENGTH = 254;
export const USERNAME_MAX_LENGTH = 150;
export const PERSON_NAME_MAX_LENGTH = 150;
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

export const INGREDIENT_NAME_MAX_LENGTH = 128;
export const MEASUREMENT_UNIT_MAX_LENGTH = 64;
export const RECIPE_NAME_MAX_LENGTH = 256;

export const MIN_COOKING_TIME = 1;
export const MAX_COOKING_TIME = 32000;
export const MIN_AMOUNT = 1;
export const MAX_AMOUNT = 32000;

/** Letters, digits and @ . + - _ */
export const USERNAME_PATTERN = /^[\p{L}\p{N}_.@+-]+$/u;

export const usernameSchema = z
  .string()
  .min(1, "This field may not be blank.")
  .max(USERNAME_MAX_LENGTH, `Ensure this field has no more than ${USERNAME_MAX_LENGTH} characters.`)
  .regex(
    USERNAME_PATTERN,
    "Enter a valid username. It may contain only letters, numbers, and @/./+/-/_ characters."
  );

export const passwordSchema = z
  .string()
  .min(PASSWORD_MIN_LENGTH, `This password is too short. It must contain at least ${PASSWORD_MIN_LENGTH} characters.`)
  .max(PASSWORD_MAX_LENGTH, `Ensure this field has no more than ${PASSWORD_MAX_LENGTH} characters.`)
  .refine((v) => !/^\d+$/.test(v), { message: "This password is entirely numeric." });

export const ingredientSchema = z.object({
  name: z.string().trim().min(1).max(INGREDIENT_NAME_MAX_LENGTH),
  measurement_unit: z.string().trim().min(1).max(MEASUREMENT_UNIT_MAX_LENGTH),
});

/**
 * A JSON integer, or a string of digits as form posts send it.
 * Booleans, arrays and blank strings are rejected rather than coerced.
 */
export function integerSchema(min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z
    .union(
      [z.number(), z.string().trim().regex(/^-?\d+$/).transform(Number)],
      { error: "A valid integer is required." }
    )
    .pipe(
      z
        .number()
        .int("A valid integer is required.")
        .min(min, `Ensure this value is greater than or equal to ${min}.`)
        .max(max, `Ensure this value is less than or equal to ${max}.`)
    );
}

export const cookingTimeSchema = integerSchema(MIN_COOKING_TIME, MAX_COOKING_TIME);

export const amountSchema = integerSchema(MIN_AMOUNT, MAX_AMOUNT);
