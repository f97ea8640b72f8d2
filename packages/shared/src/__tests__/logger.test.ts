import { describe, it, expect } from "vitest";
import { createLogger, logExternalCall } from "../logger.js";

function capture(level?: string) {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level,
    sink: (line) => lines.push(JSON.parse(line) as Record<string, unknown>),
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("should drop entries below the configured level", () => {
    const { logger, lines } = capture("warn");
    logger.info("ignored");
    logger.warn("kept");
    expect(lines.map((l) => l.msg)).toEqual(["kept"]);
  });

  it("should fall back to info for an unknown level", () => {
    const { logger, lines } = capture("verbose");
    logger.debug("ignored");
    logger.info("kept");
    expect(lines.map((l) => l.msg)).toEqual(["kept"]);
  });

  it("should merge child bindings and entry data", () => {
    const { logger, lines } = capture();
    logger.child({ component: "worker" }).error("Cycle failed", { cycle: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "error",
      msg: "Cycle failed",
      component: "worker",
      cycle: 3,
    });
    expect(typeof lines[0]?.timestamp).toBe("string");
  });
});

describe("logExternalCall", () => {
  it("should log success at info and failure at error", () => {
    const { logger, lines } = capture();
    logExternalCall(logger, "gemini", "generate_content", 12);
    logExternalCall(logger, "postmark", "send_email", 5, "timeout");

    expect(lines[0]).toMatchObject({
      level: "info",
      msg: "External call completed",
      service: "gemini",
      operation: "generate_content",
      durationMs: 12,
    });
    expect(lines[1]).toMatchObject({
      level: "error",
      msg: "External call failed",
      service: "postmark",
      error: "timeout",
    });
  });
});
