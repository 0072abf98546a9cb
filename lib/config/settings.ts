/**
 * Runtime settings read from the environment.
 * Parsed on every call so tests and scripts can change process.env freely.
 */

import * as z from "zod";
import { config as loadDotenv } from "dotenv";
import { getDataDir, getMediaRoot } from "./data-dir";

const DEV_SECRET_KEY = "foodgram-insecure-development-key";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);

const envSchema = z.object({
  SECRET_KEY: z.string().optional(),
  DEBUG: z.string().optional(),
  ALLOWED_HOSTS: z.string().optional(),
  DB_DRIVER: z.enum(["sqlite", "postgres"]).default("sqlite"),
  POSTGRES_USER: z.string().min(1).default("postgres"),
  POSTGRES_PASSWORD: z.string().default(""),
  POSTGRES_DB: z.string().min(1).default("foodgram"),
  DB_HOST: z.string().min(1).default("localhost"),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
});

export interface PostgresSettings {
  user: string;
  password: string;
  database: string;
  host: string;
  port: number;
}

export interface Settings {
  secretKey: string;
  debug: boolean;
  allowedHosts: string[];
  dbDriver: "sqlite" | "postgres";
  postgres: PostgresSettings;
  dataDir: string;
  mediaRoot: string;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function parseBoolean(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.has(value.trim().toLowerCase());
}

export function parseHostList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((h) => h.trim().toLowerCase())
    .filter((h) => h.length > 0);
}

/** Empty strings count as unset, the way docker-compose passes blank vars. */
function readEnv(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function getSettings(): Settings {
  const parsed = envSchema.safeParse(readEnv());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") || "environment";
    throw new ConfigurationError(`Invalid ${name}: ${issue?.message ?? "invalid value"}`);
  }
  const env = parsed.data;
  const debug = parseBoolean(env.DEBUG);

  let secretKey = env.SECRET_KEY;
  if (!secretKey) {
    if (!debug) {
      throw new ConfigurationError("SECRET_KEY must be set when DEBUG is off");
    }
    secretKey = DEV_SECRET_KEY;
  }

  return {
    secretKey,
    debug,
    allowedHosts: parseHostList(env.ALLOWED_HOSTS),
    dbDriver: env.DB_DRIVER,
    postgres: {
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
      database: env.POSTGRES_DB,
      host: env.DB_HOST,
      port: env.DB_PORT,
    },
    dataDir: getDataDir(),
    mediaRoot: getMediaRoot(),
  };
}

/**
 * Load .env from the working directory into process.env
 * (without overwriting existing vars).
 */
export function loadEnvFile(path = ".env"): void {
  loadDotenv({ path });
}
