import WebSocket from "ws";

import type { TransportEventSink } from "./event-queue";
import { silentLogger, type Logger } from "./logger";

export type ConnectionState = "disconnected" | "connecting" | "open" | "closing";

export interface TransportConfiguration {
  readonly url: string;
  readonly token: string;
  readonly reconnectDelayMs: number;
  readonly pingIntervalMs: number;
  readonly pongTimeoutMs: number;
  readonly stopTimeoutMs: number;
}

export interface Transport {
  readonly state: ConnectionState;
  readonly start: () => void;
  readonly send: (text: string) => boolean;
  readonly stop: (timeoutMs?: number) => Promise<boolean>;
}

const ABNORMAL_CLOSURE = 1006;
const NORMAL_CLOSURE = 1000;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const rawDataToText = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
};

/**
 * Keeps one WebSocket to the game server alive until stopped. Every failure is
 * turned into events on the sink and, while running, a reconnect after a
 * fixed delay. Nothing thrown inside the socket lifecycle escapes this class.
 */
export class WebSocketTransport implements Transport {
  private socket: WebSocket | null = null;
  private connectionState: ConnectionState = "disconnected";
  private running = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly closeWaiters: (() => void)[] = [];

  constructor(
    public readonly configuration: TransportConfiguration,
    private readonly events: TransportEventSink,
    private readonly logger: Logger = silentLogger,
  ) {}

  get state(): ConnectionState {
    return this.connectionState;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.connect();
  }

  send(text: string): boolean {
    const socket = this.socket;
    if (!socket || this.connectionState !== "open" || socket.readyState !== WebSocket.OPEN) {
      this.reportSendFailure("WebSocket is not connected.");
      return false;
    }

    try {
      socket.send(text, (error) => {
        if (error) {
          this.reportSendFailure(describeError(error));
        }
      });
    } catch (error) {
      this.reportSendFailure(describeError(error));
      return false;
    }
    this.logger.debug(`sent ${text}`);
    return true;
  }

  async stop(timeoutMs: number = this.configuration.stopTimeoutMs): Promise<boolean> {
    this.running = false;
    this.clearReconnect();
    this.stopHeartbeat();

    const socket = this.socket;
    if (!socket) {
      this.connectionState = "disconnected";
      return true;
    }

    this.connectionState = "closing";
    const closed = new Promise<boolean>((resolve) => {
      this.closeWaiters.push(() => resolve(true));
    });

    try {
      socket.close(NORMAL_CLOSURE, "client stopped");
    } catch (error) {
      this.logger.warn(`closing the socket failed: ${describeError(error)}`);
      socket.terminate();
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });

    const result = await Promise.race([closed, timedOut]);
    clearTimeout(timer);
    if (!result) {
      this.logger.warn(`socket did not close within ${timeoutMs}ms; terminating`);
      socket.terminate();
    }
    return result;
  }

  private connect(): void {
    this.reconnectTimer = null;
    if (!this.running) {
      return;
    }

    this.connectionState = "connecting";
    this.logger.info(`connecting to ${this.configuration.url}`);

    let socket: WebSocket;
    try {
      socket = new WebSocket(this.configuration.url, {
        headers: { Authorization: `Bearer ${this.configuration.token}` },
      });
    } catch (error) {
      const description = describeError(error);
      this.connectionState = "disconnected";
      this.events.push({ kind: "error", description });
      this.events.push({ kind: "closed", code: ABNORMAL_CLOSURE, reason: description });
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;
    socket.on("open", () => this.handleOpen(socket));
    socket.on("message", (data) => this.handleMessage(socket, data));
    socket.on("pong", () => this.handlePong(socket));
    socket.on("error", (error) => this.handleError(socket, error));
    socket.on("close", (code, reason) => this.handleClose(socket, code, reason.toString("utf8")));
  }

  private handleOpen(socket: WebSocket): void {
    if (socket !== this.socket || !this.running) {
      return;
    }
    this.connectionState = "open";
    this.logger.info("connection opened");
    this.startHeartbeat(socket);
    this.events.push({ kind: "opened" });
  }

  private handleMessage(socket: WebSocket, data: WebSocket.RawData): void {
    if (socket !== this.socket) {
      return;
    }
    this.events.push({ kind: "message", text: rawDataToText(data) });
  }

  private handlePong(socket: WebSocket): void {
    if (socket !== this.socket) {
      return;
    }
    this.clearPongTimeout();
  }

  private handleError(socket: WebSocket, error: Error): void {
    if (socket !== this.socket) {
      return;
    }
    const description = describeError(error);
    this.logger.warn(`socket error: ${description}`);
    this.events.push({ kind: "error", description });
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    if (socket !== this.socket) {
      return;
    }
    this.socket = null;
    this.stopHeartbeat();
    this.connectionState = "disconnected";
    this.events.push({ kind: "closed", code, reason });

    const waiters = this.closeWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }

    if (this.running) {
      this.logger.info(
        `connection closed (code ${code}${reason ? `, ${reason}` : ""}); retrying in ${this.configuration.reconnectDelayMs}ms`,
      );
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (!this.running) {
      return;
    }
    this.clearReconnect();
    this.reconnectTimer = setTimeout(() => this.connect(), this.configuration.reconnectDelayMs);
  }

  private clearReconnect(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private startHeartbeat(socket: WebSocket): void {
    this.stopHeartbeat();
    const interval = this.configuration.pingIntervalMs;
    if (!Number.isFinite(interval) || interval <= 0) {
      return;
    }
    this.pingTimer = setInterval(() => {
      if (this.pongTimer !== null) {
        return;
      }
      try {
        socket.ping();
      } catch (error) {
        this.logger.warn(`ping failed: ${describeError(error)}`);
        return;
      }
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        this.logger.warn(`no pong within ${this.configuration.pongTimeoutMs}ms; dropping connection`);
        socket.terminate();
      }, this.configuration.pongTimeoutMs);
    }, Math.floor(interval));
  }

  private stopHeartbeat(): void {
    if (this.pingTimer !== null) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.clearPongTimeout();
  }

  private clearPongTimeout(): void {
    if (this.pongTimer !== null) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private reportSendFailure(description: string): void {
    this.logger.warn(`send dropped: ${description}`);
    this.events.push({ kind: "sendFailed", description });
  }
}
