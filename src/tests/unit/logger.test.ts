import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createLogger, logContext } from "../../config/logger";

function captureLogger(minLevel: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = createLogger({ minLevel, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe("createLogger", () => {
  it("drops entries below the minimum level", () => {
    const { logger, lines } = captureLogger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    assert.equal(lines.length, 1);
    assert.equal(JSON.parse(lines[0]).message, "shown");
  });

  it("writes one JSON line per entry and redacts secrets", () => {
    const { logger, lines } = captureLogger("debug");
    logger.error("login failed", { email: "ada@example.com", password: "test-password", authorization: "Bearer x" });

    assert.ok(lines[0].endsWith("\n"));
    const entry = JSON.parse(lines[0]);
    assert.equal(entry.level, "error");
    assert.deepEqual(entry.meta, {
      email: "ada@example.com",
      password: "[REDACTED]",
      authorization: "[REDACTED]",
    });
  });

  it("merges context and fields in logContext", () => {
    const { logger, lines } = captureLogger("debug");
    logContext(logger, "warn", "slow ranking", { user_id: 3, route: "recommendations" }, { latency_ms: 900 });

    const entry = JSON.parse(lines[0]);
    assert.equal(entry.level, "warn");
    assert.deepEqual(entry.meta, { user_id: 3, route: "recommendations", latency_ms: 900 });
  });
});
