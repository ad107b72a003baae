import dotenv from "dotenv";
import { Singleton } from "tstl";

/**
 * Global accessors of the backend process.
 *
 * Only the environment lives here. Storage handles are never global: every
 * provider receives its `EntityManager` from the caller.
 */
export class MyGlobal {
  /**
   * Environment variables, loaded from `.env` and validated on first access.
   */
  public static get env(): MyGlobal.IEnvironments {
    return environments.get();
  }
}
export namespace MyGlobal {
  export interface IEnvironments {
    API_PORT: number;
    JWT_SECRET_KEY: string;
    JWT_EXPIRES_IN_SECONDS: number;

    /** PostgreSQL connection string, `null` for the sqlite file. */
    DATABASE_URL: string | null;
    YAMDB_SQLITE_PATH: string;

    /** Sender address of every outgoing email. */
    ADMIN_EMAIL: string;

    /** SMTP connection string, `null` to log messages instead. */
    SMTP_URL: string | null;

    CONFIRMATION_CODE_TTL_HOURS: number;
  }
}

const environments = new Singleton((): MyGlobal.IEnvironments => {
  dotenv.config();

  const secret: string | undefined = process.env.JWT_SECRET_KEY;
  if (secret === undefined || secret.length === 0)
    throw new Error("JWT_SECRET_KEY environment variable is required.");

  return {
    API_PORT: integer("API_PORT", 37001),
    JWT_SECRET_KEY: secret,
    JWT_EXPIRES_IN_SECONDS: integer("JWT_EXPIRES_IN_SECONDS", 24 * 60 * 60),
    DATABASE_URL: optional("DATABASE_URL"),
    YAMDB_SQLITE_PATH: optional("YAMDB_SQLITE_PATH") ?? "yamdb.sqlite",
    ADMIN_EMAIL: optional("ADMIN_EMAIL") ?? "admin@yamdb.local",
    SMTP_URL: optional("SMTP_URL"),
    CONFIRMATION_CODE_TTL_HOURS: integer("CONFIRMATION_CODE_TTL_HOURS", 24),
  };
});

function optional(key: string): string | null {
  const value: string | undefined = process.env[key];
  return value === undefined || value.length === 0 ? null : value;
}

function integer(key: string, fallback: number): number {
  const value: string | null = optional(key);
  if (value === null) return fallback;

  const parsed: number = Number(value);
  if (Number.isInteger(parsed) === false || parsed <= 0)
    throw new Error(`${key} environment variable must be a positive integer.`);
  return parsed;
}
