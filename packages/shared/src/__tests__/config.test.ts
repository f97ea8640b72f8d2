// =============================================================================
// Unit tests for environment configuration loading
// =============================================================================

import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

const BASE_ENV: Record<string, string> = {
  SOURCE_URL: "https://example.substack.com",
  GEMINI_API_KEY: "test-gemini-key",
  POSTMARK_API_TOKEN: "test-postmark-token",
  EMAIL_SENDER: "digest@example.com",
  EMAIL_RECEIVERS: "a@example.com, b@example.com,,",
};

function loadIssues(env: Record<string, string | undefined>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("should apply defaults for optional variables", () => {
    const config = loadConfig(BASE_ENV);

    expect(config.SOURCE_URL).toBe("https://example.substack.com");
    expect(config.CHECK_INTERVAL).toBe(3600);
    expect(config.PORT).toBe(8080);
    expect(config.APP_URL).toBe("http://127.0.0.1:8080");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.GEMINI_MODEL).toBe("gemini-2.5-flash");
    expect(config.EMAIL_SUBJECT).toBe("Summary of the latest post");
    expect(config.SOURCE_LINK_SELECTOR).toBe("a.sitemap-link");
    expect(config.SOURCE_BODY_SELECTOR).toBe("div.body");
    expect(config.REQUEST_TIMEOUT_MS).toBe(30_000);
    expect(config.SELF_PING_ENABLED).toBe(true);
    expect(config.SELF_PING_CRON).toBe("*/10 * * * *");
    expect(config.STATE_FILE).toBeUndefined();
    expect(config.CONTROL_API_KEYS).toBeUndefined();
    expect(config.POSTMARK_MESSAGE_STREAM).toBeUndefined();
  });

  it("should split recipients on commas and drop blanks", () => {
    const config = loadConfig(BASE_ENV);
    expect(config.EMAIL_RECEIVERS).toEqual(["a@example.com", "b@example.com"]);
  });

  it("should derive the loopback APP_URL from PORT", () => {
    const config = loadConfig({ ...BASE_ENV, PORT: "9090" });
    expect(config.PORT).toBe(9090);
    expect(config.APP_URL).toBe("http://127.0.0.1:9090");
  });

  it("should strip trailing slashes from an explicit APP_URL", () => {
    const config = loadConfig({
      ...BASE_ENV,
      APP_URL: "https://postwatch.example.com/",
    });
    expect(config.APP_URL).toBe("https://postwatch.example.com");
  });

  it("should coerce numeric and boolean variables", () => {
    const config = loadConfig({
      ...BASE_ENV,
      CHECK_INTERVAL: "60",
      REQUEST_TIMEOUT_MS: "5000",
      SELF_PING_ENABLED: "false",
    });
    expect(config.CHECK_INTERVAL).toBe(60);
    expect(config.REQUEST_TIMEOUT_MS).toBe(5000);
    expect(config.SELF_PING_ENABLED).toBe(false);
  });

  it("should parse CONTROL_API_KEYS as a key -> client map", () => {
    const config = loadConfig({
      ...BASE_ENV,
      CONTROL_API_KEYS: '{"test-key": "ops"}',
    });
    expect(config.CONTROL_API_KEYS).toEqual({ "test-key": "ops" });
  });

  it("should report every missing required variable", () => {
    const issues = loadIssues({
      GEMINI_API_KEY: "test-gemini-key",
      POSTMARK_API_TOKEN: "test-postmark-token",
      EMAIL_SENDER: "digest@example.com",
    });
    expect(issues).toEqual([
      "SOURCE_URL: Required",
      "EMAIL_RECEIVERS: Required",
    ]);
  });

  it("should reject a recipient list with no addresses", () => {
    const issues = loadIssues({ ...BASE_ENV, EMAIL_RECEIVERS: " , " });
    expect(issues).toEqual([
      "EMAIL_RECEIVERS: EMAIL_RECEIVERS must list at least one address",
    ]);
  });

  it("should reject malformed CONTROL_API_KEYS", () => {
    expect(loadIssues({ ...BASE_ENV, CONTROL_API_KEYS: "not json" })).toEqual(
      ["CONTROL_API_KEYS: CONTROL_API_KEYS must be valid JSON"],
    );
    expect(
      loadIssues({ ...BASE_ENV, CONTROL_API_KEYS: '{"test-key": 1}' }),
    ).toEqual([
      'CONTROL_API_KEYS: CONTROL_API_KEYS value for "test-key" must be a string, got number',
    ]);
  });

  it("should reject an invalid self-ping schedule", () => {
    const issues = loadIssues({ ...BASE_ENV, SELF_PING_CRON: "every minute" });
    expect(issues).toEqual([
      "SELF_PING_CRON: SELF_PING_CRON must be a valid cron expression",
    ]);
  });

  it("should carry the issues in the error message", () => {
    expect(() => loadConfig({ ...BASE_ENV, SOURCE_URL: undefined })).toThrow(
      "Invalid configuration: SOURCE_URL: Required",
    );
  });
});
