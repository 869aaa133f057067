// Unit tests for the console logger

import { describe, it, expect, vi } from "vitest";
import { createLogger, formatContext, formatLine } from "./logger.js";
import type { LogSink } from "./logger.js";

function createSink() {
  const sink = { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies LogSink;
  return sink;
}

describe("formatContext", () => {
  it("renders key=value pairs, quoting values with whitespace and skipping undefined", () => {
    expect(formatContext({ tenantId: "acme", attempt: 2, ok: true, reason: "connection reset", skipped: undefined })).toBe(
      ' tenantId=acme attempt=2 ok=true reason="connection reset"',
    );
    expect(formatContext()).toBe("");
    expect(formatContext({ skipped: undefined })).toBe("");
  });
});

describe("formatLine", () => {
  it("prefixes level and component", () => {
    expect(formatLine("warn", "Store", "Retrying", { attempt: 1 })).toBe("[WARN] [Store] Retrying attempt=1");
  });
});

describe("createLogger", () => {
  it("routes each level to the matching sink method", () => {
    const sink = createSink();
    const logger = createLogger("Pipeline", { level: "debug", sink });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e", { sessionId: "s1" });

    expect(sink.log.mock.calls).toEqual([["[DEBUG] [Pipeline] d"], ["[INFO] [Pipeline] i"]]);
    expect(sink.warn).toHaveBeenCalledWith("[WARN] [Pipeline] w");
    expect(sink.error).toHaveBeenCalledWith("[ERROR] [Pipeline] e sessionId=s1");
  });

  it("drops messages below the minimum level", () => {
    const sink = createSink();
    const logger = createLogger("Pipeline", { level: "warn", sink });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledTimes(1);
  });

  it("names child loggers after their parent", () => {
    const sink = createSink();

    createLogger("Pipeline", { sink }).child("Scoring").info("done");

    expect(sink.log).toHaveBeenCalledWith("[INFO] [Pipeline:Scoring] done");
  });
});
