import { jwtDecode } from "jwt-decode";

import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from "./config";
import { silentLogger, type Logger } from "./logger";

export interface Credentials {
  readonly login: string;
  readonly password: string;
}

export interface ServerEndpoints {
  readonly baseUrl: string;
  readonly websocketUrl: string;
}

export interface Session {
  readonly userId: number;
  readonly token: string;
  readonly serverBaseUrl: string;
  readonly websocketUrl: string;
}

export type SessionErrorKind =
  | "invalidCredentials"
  | "unreachable"
  | "rejected"
  | "missingToken"
  | "invalidToken";

export class SessionError extends Error {
  override readonly name = "SessionError";

  constructor(
    public readonly kind: SessionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export interface SessionClient {
  readonly endpoints: ServerEndpoints;
  readonly register: (credentials: Credentials) => Promise<void>;
  readonly login: (credentials: Credentials) => Promise<Session>;
}

export const resolveServerEndpoints = (host: string, port: string | number): ServerEndpoints => {
  const trimmedHost = host.trim();
  const trimmedPort = String(port).trim();
  const resolvedHost = trimmedHost.length > 0 ? trimmedHost : DEFAULT_SERVER_HOST;
  const resolvedPort = trimmedPort.length > 0 ? trimmedPort : String(DEFAULT_SERVER_PORT);
  return {
    baseUrl: `http://${resolvedHost}:${resolvedPort}`,
    websocketUrl: `ws://${resolvedHost}:${resolvedPort}/api/ws`,
  };
};

/**
 * Reads the numeric user id from the token's `sub` claim. The signature is not
 * checked here; the server verifies the token on every request and the client
 * only uses the claim to recognise its own player.
 */
export const decodeUserId = (token: string): number => {
  let subject: unknown;
  try {
    subject = jwtDecode(token).sub;
  } catch (error) {
    throw new SessionError("invalidToken", "Could not decode the login token.", { cause: error });
  }

  if (typeof subject === "number" && Number.isInteger(subject)) {
    return subject;
  }
  if (typeof subject === "string" && /^-?\d+$/.test(subject.trim())) {
    return Number.parseInt(subject.trim(), 10);
  }
  throw new SessionError("invalidToken", "Login token does not carry a numeric user id.");
};

const ensureCredentials = (credentials: Credentials): Credentials => {
  if (credentials.login.length === 0 || credentials.password.length === 0) {
    throw new SessionError("invalidCredentials", "Login and password must not be empty.");
  }
  return credentials;
};

const readBody = async (response: Response): Promise<string> => {
  try {
    return await response.text();
  } catch {
    return "";
  }
};

const readToken = (body: string): string | null => {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return null;
  }
  if (!payload || typeof payload !== "object" || !("token" in payload)) {
    return null;
  }
  const token = payload.token;
  return typeof token === "string" && token.length > 0 ? token : null;
};

export class HttpSessionClient implements SessionClient {
  constructor(
    public readonly endpoints: ServerEndpoints,
    private readonly logger: Logger = silentLogger,
  ) {}

  async register(credentials: Credentials): Promise<void> {
    const response = await this.post("/api/register", ensureCredentials(credentials));
    if (!response.ok) {
      const body = await readBody(response);
      throw new SessionError("rejected", `Registration failed: ${body || `status ${response.status}`}`);
    }
    this.logger.info(`registered ${credentials.login}`);
  }

  async login(credentials: Credentials): Promise<Session> {
    const response = await this.post("/api/login", ensureCredentials(credentials));
    const body = await readBody(response);
    if (!response.ok) {
      throw new SessionError("rejected", `Login failed: ${body || `status ${response.status}`}`);
    }

    const token = readToken(body);
    if (token === null) {
      throw new SessionError("missingToken", "Login response did not contain a token.");
    }

    const userId = decodeUserId(token);
    this.logger.info(`logged in as user ${userId}`);
    return {
      userId,
      token,
      serverBaseUrl: this.endpoints.baseUrl,
      websocketUrl: this.endpoints.websocketUrl,
    };
  }

  private async post(path: string, credentials: Credentials): Promise<Response> {
    const url = `${this.endpoints.baseUrl}${path}`;
    try {
      return await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ login: credentials.login, password: credentials.password }),
      });
    } catch (error) {
      this.logger.warn(`request to ${url} failed`, error);
      throw new SessionError("unreachable", "Could not connect to the server.", { cause: error });
    }
  }
}
