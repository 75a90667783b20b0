/**
 * Environment configuration
 *
 * Validates process.env once at startup with zod so the app fails fast on a
 * bad deployment. Import `env` instead of reading process.env directly.
 */

// dotenv has to run before the schema reads process.env
import dotenv from "dotenv";
dotenv.config();

import { z } from "zod";

const envSchema = z.object({
  /** PostgreSQL connection string */
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),

  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  PORT: z.coerce.number().int().positive().default(3000),

  /** pino level; defaults depend on NODE_ENV */
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10000),

  /** Order events are published only when a broker is configured */
  RABBITMQ_URL: z.string().url().optional(),
  ORDER_EVENTS_QUEUE: z.string().min(1).default("order-events"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return result.data;
}

export const env = loadEnv();

export const isProduction = env.NODE_ENV === "production";
export const isTest = env.NODE_ENV === "test";
