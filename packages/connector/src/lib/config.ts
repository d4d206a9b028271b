/**
 * Environment configuration
 *
 * Loads .env for local development and validates process.env once.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { setDefaultLogLevel } from "./logger.js";

loadDotenv();

const optional = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

export const ConfigSchema = z.object({
  DATABASE_URL: optional,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  CIO_COMPANY_NAME: z.string().min(1).default("Oxide"),
  WEBHOOKY_BIND: z
    .string()
    .regex(/^[^:]+:\d+$/, "expected host:port")
    .default("0.0.0.0:8080"),
  WEBHOOKY_BEARER_TOKEN: optional,

  AIRTABLE_API_KEY: optional,
  AIRTABLE_ENTERPRISE_ACCOUNT_ID: optional,
  CHECKR_API_KEY: optional,

  GUSTO_CLIENT_ID: optional,
  GUSTO_CLIENT_SECRET: optional,
  GUSTO_REDIRECT_URI: optional,
  MAILCHIMP_CLIENT_ID: optional,
  MAILCHIMP_CLIENT_SECRET: optional,
  MAILCHIMP_REDIRECT_URI: optional,
  MAILCHIMP_WEBHOOK_KEY: optional,
  MAILCHIMP_LIST_ID_RACK_LINE: optional,
  QUICKBOOKS_CLIENT_ID: optional,
  QUICKBOOKS_CLIENT_SECRET: optional,
  QUICKBOOKS_REDIRECT_URI: optional,
  RAMP_CLIENT_ID: optional,
  RAMP_CLIENT_SECRET: optional,
  TRIPACTIONS_CLIENT_ID: optional,
  TRIPACTIONS_CLIENT_SECRET: optional,
  ZOOM_ACCOUNT_ID: optional,
  ZOOM_CLIENT_ID: optional,
  ZOOM_CLIENT_SECRET: optional,
  GOOGLE_CLIENT_ID: optional,
  GOOGLE_CLIENT_SECRET: optional,
  GOOGLE_REDIRECT_URI: optional,
  ZOHO_CLIENT_ID: optional,
  ZOHO_CLIENT_SECRET: optional,
  ZOHO_REDIRECT_URI: optional,
});

export type Config = z.infer<typeof ConfigSchema>;

export type OptionalKey = {
  [K in keyof Config]-?: undefined extends Config[K] ? K : never;
}[keyof Config];

let cachedConfig: Config | null = null;

/**
 * Validate an environment map.
 *
 * @throws ConfigError naming the first invalid variable
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue.path[0] ?? "config");
    throw new ConfigError(key, `Invalid ${key}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Parse and cache configuration from process.env.
 * Applies LOG_LEVEL to the global logger unless a level was set explicitly
 * (CLI --log-level).
 */
export function getConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  cachedConfig = parseConfig(process.env);
  if (cachedConfig.LOG_LEVEL) {
    setDefaultLogLevel(cachedConfig.LOG_LEVEL);
  }
  return cachedConfig;
}

/**
 * Get a value that must be set for the current operation.
 */
export function requireConfig<K extends OptionalKey>(key: K): NonNullable<Config[K]> {
  const value = getConfig()[key];
  if (value === undefined || value === null) {
    throw new ConfigError(key);
  }
  return value;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export function parseBind(bind: string): { hostname: string; port: number } {
  const index = bind.lastIndexOf(":");
  return { hostname: bind.slice(0, index), port: parseInt(bind.slice(index + 1), 10) };
}
