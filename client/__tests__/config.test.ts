import { describe, expect, it } from "vitest";

import { DEFAULT_TRANSPORT_TIMING, loadClientConfiguration, parsePort } from "../config";

describe("loadClientConfiguration", () => {
  it("uses the local server and quiet logging by default", () => {
    const configuration = loadClientConfiguration({});

    expect(configuration.server).toEqual({ host: "127.0.0.1", port: 3000 });
    expect(configuration.grid).toEqual({ width: 40, height: 20 });
    expect(configuration.positionSendIntervalMs).toBe(100);
    expect(configuration.logoutGraceMs).toBe(500);
    expect(configuration.transport).toEqual(DEFAULT_TRANSPORT_TIMING);
    expect(configuration.transport.reconnectDelayMs).toBe(5000);
    expect(configuration.logLevel).toBe("warn");
    expect(configuration.colors).toBe(true);
    expect(Object.isFrozen(configuration)).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const configuration = loadClientConfiguration({
      GRID_SERVER_HOST: " game.local ",
      GRID_SERVER_PORT: "4000",
      GRID_LOG_LEVEL: "DEBUG",
      NO_COLOR: "1",
    });

    expect(configuration.server).toEqual({ host: "game.local", port: 4000 });
    expect(configuration.logLevel).toBe("debug");
    expect(configuration.colors).toBe(false);
  });

  it("treats blank values as unset", () => {
    const configuration = loadClientConfiguration({ GRID_SERVER_HOST: "  ", GRID_SERVER_PORT: "", NO_COLOR: "" });

    expect(configuration.server).toEqual({ host: "127.0.0.1", port: 3000 });
    expect(configuration.colors).toBe(true);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadClientConfiguration({ GRID_LOG_LEVEL: "loud" })).toThrowError(
      'GRID_LOG_LEVEL must be one of debug, info, warn, error, silent; received "loud".',
    );
  });

  it("rejects a malformed port", () => {
    expect(() => loadClientConfiguration({ GRID_SERVER_PORT: "abc" })).toThrowError(
      'GRID_SERVER_PORT must be an integer port, received "abc".',
    );
  });
});

describe("parsePort", () => {
  it("accepts the full port range", () => {
    expect(parsePort("1", "port")).toBe(1);
    expect(parsePort(" 65535 ", "port")).toBe(65_535);
  });

  it("rejects ports outside the range", () => {
    expect(() => parsePort("0", "Server port")).toThrowError("Server port must be between 1 and 65535, received 0.");
    expect(() => parsePort("70000", "Server port")).toThrowError(
      "Server port must be between 1 and 65535, received 70000.",
    );
  });
});
