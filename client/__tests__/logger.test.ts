import { describe, expect, it, vi } from "vitest";

import { createConsoleLogger, isLogLevel } from "../logger";

const createSink = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe("createConsoleLogger", () => {
  it("prefixes messages with the scope and drops levels below the threshold", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ scope: "grid-client", level: "warn", sink });

    logger.info("connecting");
    logger.warn("send dropped", { code: 1006 });

    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[grid-client] send dropped", { code: 1006 });
  });

  it("nests child scopes", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ scope: "grid-client", level: "debug", sink }).child("transport");

    logger.debug("sent frame");

    expect(sink.debug).toHaveBeenCalledWith("[grid-client:transport] sent frame");
  });

  it("writes nothing when silent", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ scope: "grid-client", level: "silent", sink });

    logger.error("fatal");

    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("recognises the known levels only", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
