import { GRID_DIMENSIONS, type GridDimensions } from "./grid";
import { isLogLevel, type LogLevel } from "./logger";

export interface ServerAddress {
  readonly host: string;
  readonly port: number;
}

export interface TransportTiming {
  readonly reconnectDelayMs: number;
  readonly pingIntervalMs: number;
  readonly pongTimeoutMs: number;
  readonly stopTimeoutMs: number;
}

export interface ClientConfiguration {
  readonly server: ServerAddress;
  readonly grid: GridDimensions;
  readonly cellWidth: number;
  readonly transport: TransportTiming;
  readonly positionSendIntervalMs: number;
  readonly logoutGraceMs: number;
  readonly logLevel: LogLevel;
  readonly colors: boolean;
}

export const DEFAULT_SERVER_HOST = "127.0.0.1";
export const DEFAULT_SERVER_PORT = 3000;

export const DEFAULT_TRANSPORT_TIMING: TransportTiming = {
  reconnectDelayMs: 5000,
  pingIntervalMs: 10_000,
  pongTimeoutMs: 5000,
  stopTimeoutMs: 5000,
};

export const DEFAULT_CLIENT_CONFIGURATION: ClientConfiguration = {
  server: { host: DEFAULT_SERVER_HOST, port: DEFAULT_SERVER_PORT },
  grid: GRID_DIMENSIONS,
  cellWidth: 2,
  transport: DEFAULT_TRANSPORT_TIMING,
  positionSendIntervalMs: 100,
  logoutGraceMs: 500,
  logLevel: "warn",
  colors: true,
};

export const parsePort = (value: string, context: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`${context} must be an integer port, received "${value}".`);
  }
  const port = Number.parseInt(trimmed, 10);
  if (port < 1 || port > 65_535) {
    throw new Error(`${context} must be between 1 and 65535, received ${port}.`);
  }
  return port;
};

const readOptional = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export const loadClientConfiguration = (env: NodeJS.ProcessEnv = process.env): ClientConfiguration => {
  const host = readOptional(env, "GRID_SERVER_HOST") ?? DEFAULT_SERVER_HOST;
  const portValue = readOptional(env, "GRID_SERVER_PORT");
  const port = portValue === undefined ? DEFAULT_SERVER_PORT : parsePort(portValue, "GRID_SERVER_PORT");

  const levelValue = readOptional(env, "GRID_LOG_LEVEL")?.toLowerCase();
  let logLevel: LogLevel = DEFAULT_CLIENT_CONFIGURATION.logLevel;
  if (levelValue !== undefined) {
    if (!isLogLevel(levelValue)) {
      throw new Error(
        `GRID_LOG_LEVEL must be one of debug, info, warn, error, silent; received "${levelValue}".`,
      );
    }
    logLevel = levelValue;
  }

  return Object.freeze({
    ...DEFAULT_CLIENT_CONFIGURATION,
    server: { host, port },
    logLevel,
    colors: readOptional(env, "NO_COLOR") === undefined,
  });
};
