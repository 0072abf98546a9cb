import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  ConfigurationError,
  getSettings,
  parseBoolean,
  parseHostList,
} from "@/lib/config/settings";

const KEYS = [
  "SECRET_KEY",
  "DEBUG",
  "ALLOWED_HOSTS",
  "DB_DRIVER",
  "DB_PORT",
  "DB_HOST",
  "POSTGRES_USER",
  "POSTGRES_PASSWORD",
  "POSTGRES_DB",
] as const;

let saved: Record<string, string | undefined>;

beforeEach(() => {
  saved = {};
  for (const key of KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe("parseBoolean", () => {
  it("accepts true/1/yes/on in any case", () => {
    for (const v of ["true", "TRUE", "1", "yes", " On "]) expect(parseBoolean(v)).toBe(true);
    for (const v of [undefined, "", "false", "0", "no", "maybe"]) expect(parseBoolean(v)).toBe(false);
  });
});

describe("parseHostList", () => {
  it("splits, trims and lower-cases", () => {
    expect(parseHostList(" Example.com, ,localhost ")).toEqual(["example.com", "localhost"]);
    expect(parseHostList(undefined)).toEqual([]);
  });
});

describe("getSettings", () => {
  it("uses defaults for an sqlite setup", () => {
    process.env.SECRET_KEY = "test-secret";
    const settings = getSettings();
    expect(settings.secretKey).toBe("test-secret");
    expect(settings.debug).toBe(false);
    expect(settings.dbDriver).toBe("sqlite");
    expect(settings.postgres).toEqual({
      user: "postgres",
      password: "",
      database: "foodgram",
      host: "localhost",
      port: 5432,
    });
  });

  it("reads postgres settings", () => {
    process.env.SECRET_KEY = "test-secret";
    process.env.DB_DRIVER = "postgres";
    process.env.POSTGRES_USER = "chef";
    process.env.POSTGRES_PASSWORD = "test-password";
    process.env.POSTGRES_DB = "recipes";
    process.env.DB_HOST = "db";
    process.env.DB_PORT = "6543";
    const settings = getSettings();
    expect(settings.dbDriver).toBe("postgres");
    expect(settings.postgres).toEqual({
      user: "chef",
      password: "test-password",
      database: "recipes",
      host: "db",
      port: 6543,
    });
  });

  it("requires SECRET_KEY outside debug mode", () => {
    expect(() => getSettings()).toThrow(
      new ConfigurationError("SECRET_KEY must be set when DEBUG is off")
    );
  });

  it("falls back to a development key in debug mode", () => {
    process.env.DEBUG = "true";
    expect(getSettings().secretKey).toBe("foodgram-insecure-development-key");
  });

  it("treats blank variables as unset", () => {
    process.env.SECRET_KEY = "test-secret";
    process.env.DB_PORT = "";
    process.env.DB_DRIVER = "";
    expect(getSettings().postgres.port).toBe(5432);
    expect(getSettings().dbDriver).toBe("sqlite");
  });

  it("names the invalid variable", () => {
    process.env.SECRET_KEY = "test-secret";
    process.env.DB_PORT = "not-a-port";
    expect(() => getSettings()).toThrow(/^Invalid DB_PORT: /);
    process.env.DB_PORT = "5432";
    process.env.DB_DRIVER = "mysql";
    expect(() => getSettings()).toThrow(/^Invalid DB_DRIVER: /);
  });
});
