// =============================================================================
// @postwatch/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables once at startup. Required
// variables raise a ConfigurationError listing every problem at once.
// Optional variables fall back to documented defaults.
// =============================================================================

import cron from "node-cron";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"test-key-1": "ops-dashboard"}'
 */
const apiKeysSchema = z.string().transform((val, ctx) => {
  try {
    const parsed: unknown = JSON.parse(val);
    if (
      typeof parsed !== "object" ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "CONTROL_API_KEYS must be a JSON object mapping key strings to client ID strings",
      });
      return z.NEVER;
    }
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `CONTROL_API_KEYS value for "${key}" must be a string, got ${typeof value}`,
        });
        return z.NEVER;
      }
      record[key] = value;
    }
    return record;
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "CONTROL_API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }
});

/** Comma-separated addresses; blanks are dropped, at least one must remain */
const recipientsSchema = z.string().transform((val, ctx) => {
  const recipients = val
    .split(",")
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
  if (recipients.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "EMAIL_RECEIVERS must list at least one address",
    });
    return z.NEVER;
  }
  return recipients;
});

const flagSchema = z
  .enum(["true", "false"])
  .default("true")
  .transform((val) => val === "true");

const baseUrlSchema = z
  .string()
  .url()
  .transform((val) => val.replace(/\/+$/, ""));

const configSchema = z
  .object({
    // Required
    SOURCE_URL: z.string().url(),
    GEMINI_API_KEY: z.string().min(1, "GEMINI_API_KEY must not be empty"),
    POSTMARK_API_TOKEN: z
      .string()
      .min(1, "POSTMARK_API_TOKEN must not be empty"),
    EMAIL_SENDER: z.string().min(1, "EMAIL_SENDER must not be empty"),
    EMAIL_RECEIVERS: recipientsSchema,

    // Optional with defaults
    CHECK_INTERVAL: z.coerce.number().int().min(1).default(3600),
    APP_URL: baseUrlSchema.optional(),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info"),
    GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
    EMAIL_SUBJECT: z.string().min(1).default("Summary of the latest post"),
    POSTMARK_MESSAGE_STREAM: z.string().min(1).optional(),
    SOURCE_LINK_SELECTOR: z.string().min(1).default("a.sitemap-link"),
    SOURCE_BODY_SELECTOR: z.string().min(1).default("div.body"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
    SELF_PING_ENABLED: flagSchema,
    SELF_PING_CRON: z
      .string()
      .default("*/10 * * * *")
      .refine((val) => cron.validate(val), "SELF_PING_CRON must be a valid cron expression"),
    STATE_FILE: z.string().min(1).optional(),
    CONTROL_API_KEYS: apiKeysSchema.optional(),
  })
  .transform((cfg) => ({
    ...cfg,
    // Loopback default depends on the resolved port
    APP_URL: cfg.APP_URL ?? `http://127.0.0.1:${cfg.PORT}`,
  }));

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ConfigurationError carrying one `VARIABLE: message` line for each
 * variable that is missing or fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
