/**
 * Environment variable loading and validation.
 */

import type { LevelWithSilent } from "pino";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type DecodeErrorPolicy = "fail" | "skip";

export interface CatalogConfig {
  /** `postgresql://...` or `pglite:[path]` */
  readonly databaseUrl: string;
  readonly logLevel: LevelWithSilent;
  readonly kafka: {
    readonly clientId: string;
    /** Prefix of the throwaway consumer group created per read */
    readonly groupPrefix: string;
    readonly connectionTimeoutMs: number;
  };
  readonly decodeErrorPolicy: DecodeErrorPolicy;
}

type Env = Readonly<Record<string, string | undefined>>;

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const DECODE_POLICIES: readonly DecodeErrorPolicy[] = ["fail", "skip"];

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as a positive integer.
 */
export function optionalEnvInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a positive integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable restricted to a set of values.
 */
export function optionalEnvChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const choice = choices.find((c) => c === value.toLowerCase());
  if (choice === undefined) {
    throw new ConfigError(
      `Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`
    );
  }
  return choice;
}

/**
 * Read the catalog configuration from the environment.
 * The CLI loads `.env` into `process.env` first; library callers pass their own env.
 */
export function loadConfig(env: Env = process.env): CatalogConfig {
  return {
    databaseUrl: optionalEnv(env, "DATABASE_URL", "pglite:"),
    logLevel: optionalEnvChoice(env, "LOG_LEVEL", LOG_LEVELS, "info"),
    kafka: {
      clientId: optionalEnv(env, "KAFKA_CLIENT_ID", "ml-message-catalog"),
      groupPrefix: optionalEnv(env, "KAFKA_GROUP_PREFIX", "ml-message-catalog-reader"),
      connectionTimeoutMs: optionalEnvInt(env, "KAFKA_CONNECTION_TIMEOUT_MS", 3000),
    },
    decodeErrorPolicy: optionalEnvChoice(env, "STREAM_DECODE_POLICY", DECODE_POLICIES, "fail"),
  };
}
