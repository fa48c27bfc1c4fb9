/**
 * Guild Wiki — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

const SAFE_PATH_REGEX = /^[a-zA-Z0-9_\-/.:]+$/;

// override: true in production so .env wins over a stale shell environment,
// false in tests so test env vars set before import stick.
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Everything is trimmed; copy-paste into .env tends to leave
 * trailing whitespace.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
  ALLOWED_GUILD_ID: process.env.ALLOWED_GUILD_ID?.trim(),
};

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z
    .string()
    .default("data/wiki.db")
    .refine((val) => val === ":memory:" || SAFE_PATH_REGEX.test(val), {
      message: "DB_PATH contains invalid characters",
    }),
  LOG_LEVEL: z.string().optional(),

  // Sentry is disabled when no DSN is provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  // The wiki is partitioned per guild; this only narrows where the bot expects to live.
  ALLOWED_GUILD_ID: z
    .string()
    .regex(/^\d{17,20}$/, "ALLOWED_GUILD_ID must be a Discord snowflake")
    .optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Collects every issue at once so a broken .env is fixed in one pass.
 */
export function parseEnv(input: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }
  return parsed.data;
}

/**
 * Lazily validated so modules that only need a flag (logger, scheduler) can be
 * imported without a bot token present.
 */
let cached: Env | null = null;

export function getEnv(): Env {
  if (cached) return cached;
  try {
    const env = parseEnv(raw);
    cached = env;
    return env;
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const truthyPattern = /^(1|true|yes|on)$/i;

/** Ops/test opt-out for the 24h maintenance timer. */
export function isMaintenanceSchedulerDisabled(): boolean {
  return truthyPattern.test(process.env.MAINTENANCE_SCHEDULER_DISABLED ?? "");
}
