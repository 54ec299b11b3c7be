import { z } from "zod";
import { isValidTimeZone } from "./time";

export const APP_CONFIG = Symbol("APP_CONFIG");

const LOG_LEVELS = ["error", "warn", "log", "debug", "verbose"] as const;

export type ConfigLogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_PATH: z.string().min(1).default("glucocare.db"),
  JWT_SECRET: z.string().min(1),
  JWT_EXPIRES_IN: z.string().default("15m"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().default("gpt-4o"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
  VAPID_EMAIL: z.string().optional(),
  VAPID_PUBLIC_KEY: z.string().optional(),
  VAPID_PRIVATE_KEY: z.string().optional(),
  DEFAULT_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, { message: "must be an IANA time zone" })
    .default("UTC"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("log"),
  CORS_ORIGIN: z.string().optional(),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  jwtSecret: string;
  jwtExpiresIn: string;
  openai: {
    apiKey: string | null;
    model: string;
    timeoutMs: number;
  };
  vapid: {
    email: string;
    publicKey: string;
    privateKey: string;
  } | null;
  defaultTimezone: string;
  logLevel: ConfigLogLevel;
  corsOrigin: string | null;
}

export class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  // Empty strings from .env files count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
    );
  }

  const c = result.data;
  const vapid =
    c.VAPID_EMAIL && c.VAPID_PUBLIC_KEY && c.VAPID_PRIVATE_KEY
      ? {
          email: c.VAPID_EMAIL,
          publicKey: c.VAPID_PUBLIC_KEY,
          privateKey: c.VAPID_PRIVATE_KEY,
        }
      : null;

  return {
    port: c.PORT,
    databasePath: c.DATABASE_PATH,
    jwtSecret: c.JWT_SECRET,
    jwtExpiresIn: c.JWT_EXPIRES_IN,
    openai: {
      apiKey: c.OPENAI_API_KEY ?? null,
      model: c.OPENAI_MODEL,
      timeoutMs: c.OPENAI_TIMEOUT_MS,
    },
    vapid,
    defaultTimezone: c.DEFAULT_TIMEZONE,
    logLevel: c.LOG_LEVEL,
    corsOrigin: c.CORS_ORIGIN ?? null,
  };
}

/** Levels enabled for a configured minimum, most severe first. */
export function enabledLogLevels(level: ConfigLogLevel): ConfigLogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
