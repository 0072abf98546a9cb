/**
 * Zod schemas for API request payload validation.
 * Reuses domain schemas where applicable; adds request-specific shapes.
 */

import * as z from "zod";
import {
  EMAIL_MAX_LENGTH,
  PERSON_NAME_MAX_LENGTH,
  RECIPE_NAME_MAX_LENGTH,
  amountSchema,
  cookingTimeSchema,
  integerSchema,
  passwordSchema,
  usernameSchema,
} from "@/lib/schemas";
import { imageDataUriSchema } from "@/lib/media/images";

const requiredText = (max?: number) => {
  const base = z.string().trim().min(1, "This field may not be blank.");
  return max === undefined
    ? base
    : base.max(max, `Ensure this field has no more than ${max} characters.`);
};

// Users
export const createUserSchema = z.object({
  email: z
    .string()
    .trim()
    .max(EMAIL_MAX_LENGTH, `Ensure this field has no more than ${EMAIL_MAX_LENGTH} characters.`)
    .email("Enter a valid email address."),
  username: usernameSchema,
  first_name: requiredText(PERSON_NAME_MAX_LENGTH),
  last_name: requiredText(PERSON_NAME_MAX_LENGTH),
  password: passwordSchema,
});

export const loginSchema = z.object({
  email: z.string().trim().min(1, "This field may not be blank."),
  password: z.string().min(1, "This field may not be blank."),
});

export const setPasswordSchema = z.object({
  current_password: z.string().min(1, "This field may not be blank."),
  new_password: passwordSchema,
});

export const avatarSchema = z.object({
  avatar: imageDataUriSchema,
});

// Recipes
export const recipeIngredientSchema = z.object({
  id: integerSchema(1),
  amount: amountSchema,
});

const ingredientListSchema = z
  .array(recipeIngredientSchema)
  .min(1, "Add at least one ingredient.")
  .superRefine((items, ctx) => {
    const seen = new Set<number>();
    for (const item of items) {
      if (seen.has(item.id)) {
        ctx.addIssue({ code: "custom", message: "Ingredients must not repeat." });
        return;
      }
      seen.add(item.id);
    }
  });

export const createRecipeSchema = z.object({
  ingredients: ingredientListSchema,
  image: imageDataUriSchema,
  name: requiredText(RECIPE_NAME_MAX_LENGTH),
  text: requiredText(),
  cooking_time: cookingTimeSchema,
});

/** PATCH: ingredients stay required, everything else may be omitted. */
export const updateRecipeSchema = z.object({
  ingredients: ingredientListSchema,
  image: imageDataUriSchema.optional(),
  name: requiredText(RECIPE_NAME_MAX_LENGTH).optional(),
  text: requiredText().optional(),
  cooking_time: cookingTimeSchema.optional(),
});

export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;
export type UpdateRecipeInput = z.infer<typeof updateRecipeSchema>;

// Query strings
const positiveIntParam = (message: string) =>
  z
    .string()
    .regex(/^\d+$/, message)
    .transform(Number)
    .refine((n) => n > 0 && Number.isSafeInteger(n), { message });

const booleanFlagParam = z.enum(["1", "true", "True", "0", "false", "False"], {
  message: "Must be one of 1, true, 0, false.",
}).transform((v) => v === "1" || v.toLowerCase() === "true");

export const recipeListQuerySchema = z.object({
  author: positiveIntParam("Select a valid author id.").optional(),
  is_favorited: booleanFlagParam.optional(),
  is_in_shopping_cart: booleanFlagParam.optional(),
});

export const recipesLimitQuerySchema = z.object({
  recipes_limit: z
    .string()
    .regex(/^\d+$/, "A valid non-negative integer is required.")
    .transform(Number)
    .refine(Number.isSafeInteger, {
      message: `Ensure this value is less than or equal to ${Number.MAX_SAFE_INTEGER}.`,
    })
    .optional(),
});

export const ingredientQuerySchema = z.object({
  name: z.string().optional(),
});
