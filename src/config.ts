/**
 * Environment-driven configuration, validated once at startup.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  ProviderMappingSchema,
  type ProviderMapping,
} from "./providers/mapping.js";
import { describeError } from "./utils/errors.js";

export const PROVIDER_KINDS = ["dummyjson", "mapped"] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

const MAX_TIMER_MS = 2_147_483_647;
const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

const EnvSchema = Type.Object({
  PORT: Type.Integer({ minimum: 0, maximum: 65535, default: 3000 }),
  HOST: Type.String({ default: "0.0.0.0" }),
  DATABASE_URL: Type.String({
    minLength: 1,
    default: "postgresql://localhost:5432/catalog",
  }),
  JWT_SECRET: Type.Optional(Type.String({ minLength: 1 })),
  JWT_TTL_MINUTES: Type.Integer({ minimum: 1, maximum: 24 * 60, default: 30 }),
  PASSWORD_HASH_ROUNDS: Type.Integer({ minimum: 4, maximum: 15, default: 12 }),
  CORS_ORIGINS: Type.Optional(Type.String()),
  PROVIDER: Type.Union(
    PROVIDER_KINDS.map((kind) => Type.Literal(kind)),
    { default: "dummyjson" }
  ),
  PROVIDER_BASE_URL: Type.String({
    minLength: 1,
    default: "https://dummyjson.com/products",
  }),
  PROVIDER_PAGE_SIZE: Type.Integer({ minimum: 1, maximum: 1000, default: 50 }),
  PROVIDER_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 15_000 }),
  PROVIDER_MAPPING: Type.Optional(Type.String()),
  // setTimeout/setInterval hold at most 2^31 - 1 ms
  SYNC_INTERVAL_MINUTES: Type.Number({
    minimum: 0,
    maximum: MAX_INTERVAL_MINUTES,
    default: 30,
  }),
  SYNC_ON_START: Type.Boolean({ default: false }),
  SYNC_RUN_TIMEOUT_MS: Type.Integer({
    minimum: 1,
    maximum: MAX_TIMER_MS,
    default: 600_000,
  }),
  SYNC_MAX_ERRORS: Type.Integer({ minimum: 1, default: 100 }),
});

type Env = Static<typeof EnvSchema>;

export interface ProviderConfig {
  kind: ProviderKind;
  baseUrl: string;
  pageSize: number;
  timeoutMs: number;
  mapping: ProviderMapping | null;
}

export interface SyncConfig {
  intervalMinutes: number;
  runOnStart: boolean;
  runTimeoutMs: number;
  maxErrors: number;
}

export interface AppConfig {
  server: {
    port: number;
    host: string;
    corsOrigins: string[] | true;
  };
  databaseUrl: string;
  auth: {
    jwtSecret: string | null;
    tokenTtlMinutes: number;
    /** bcrypt cost factor for new passwords */
    passwordRounds: number;
  };
  provider: ProviderConfig;
  sync: SyncConfig;
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

// Empty variables count as unset so defaults apply
function pickKnownVariables(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      picked[key] = value.trim();
    }
  }
  return picked;
}

function parseMapping(raw: string | undefined): ProviderMapping {
  if (raw === undefined) {
    throw new ConfigError(["PROVIDER_MAPPING: required when PROVIDER=mapped"]);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError([
      `PROVIDER_MAPPING: not valid JSON (${describeError(error)})`,
    ]);
  }

  const withDefaults = Value.Default(
    ProviderMappingSchema,
    Value.Clone(decoded)
  );
  if (!Value.Check(ProviderMappingSchema, withDefaults)) {
    throw new ConfigError(
      [...Value.Errors(ProviderMappingSchema, withDefaults)].map(
        (error) => `PROVIDER_MAPPING${error.path}: ${error.message}`
      )
    );
  }
  return withDefaults;
}

function parseOrigins(raw: string | undefined): string[] | true {
  if (raw === undefined || raw === "*") {
    return true;
  }
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin !== "");
}

function toAppConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigins: parseOrigins(env.CORS_ORIGINS),
    },
    databaseUrl: env.DATABASE_URL,
    auth: {
      jwtSecret: env.JWT_SECRET ?? null,
      tokenTtlMinutes: env.JWT_TTL_MINUTES,
      passwordRounds: env.PASSWORD_HASH_ROUNDS,
    },
    provider: {
      kind: env.PROVIDER,
      baseUrl: env.PROVIDER_BASE_URL,
      pageSize: env.PROVIDER_PAGE_SIZE,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      mapping:
        env.PROVIDER === "mapped" ? parseMapping(env.PROVIDER_MAPPING) : null,
    },
    sync: {
      intervalMinutes: env.SYNC_INTERVAL_MINUTES,
      runOnStart: env.SYNC_ON_START,
      runTimeoutMs: env.SYNC_RUN_TIMEOUT_MS,
      maxErrors: env.SYNC_MAX_ERRORS,
    },
  };
}

/**
 * Build the application config from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const converted = Value.Default(
    EnvSchema,
    Value.Convert(EnvSchema, pickKnownVariables(env))
  );

  if (!Value.Check(EnvSchema, converted)) {
    const problems = [...Value.Errors(EnvSchema, converted)].map(
      (error) => `${error.path.slice(1)}: ${error.message}`
    );
    throw new ConfigError(problems);
  }

  if (!URL.canParse(converted.PROVIDER_BASE_URL)) {
    throw new ConfigError([
      `PROVIDER_BASE_URL: not a valid URL (${converted.PROVIDER_BASE_URL})`,
    ]);
  }

  return toAppConfig(converted);
}
