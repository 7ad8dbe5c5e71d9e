import type { GridDimensions } from "./grid";
import type { TransportEvent, TransportEventQueue } from "./event-queue";
import type { MovementDispatcher } from "./input";
import { silentLogger, type Logger } from "./logger";
import type { Transport } from "./network";
import { PlayerStateReconciler, type ReconcilerSnapshot } from "./player-state";
import {
  createLogoutMessage,
  decodeServerMessage,
  encodeClientMessage,
  type ClientMessage,
  type ProtocolError,
} from "./protocol";
import type { Renderer, RenderOutput } from "./render";
import type { Session } from "./session";

export interface ClientManagerConfiguration {
  readonly grid: GridDimensions;
  readonly positionSendIntervalMs: number;
  readonly logoutGraceMs: number;
  readonly stopTimeoutMs: number;
}

export interface ClientLifecycleHandlers {
  readonly onConnected?: () => void;
  readonly onDisconnected?: (code: number, reason: string) => void;
  readonly onError?: (error: Error) => void;
  readonly onProtocolError?: (error: ProtocolError) => void;
  readonly onExit?: () => void;
}

export interface ClientOrchestrator extends MovementDispatcher {
  readonly configuration: ClientManagerConfiguration;
  readonly boot: (handlers?: ClientLifecycleHandlers) => void;
  readonly logout: () => Promise<void>;
  readonly snapshot: () => ReconcilerSnapshot;
}

export const CONNECTED_STATUS = "Connected to server.";
export const DISCONNECTED_STATUS = "Disconnected from server.";

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });

export class GameClientOrchestrator implements ClientOrchestrator {
  private readonly session: Session;
  private readonly transport: Transport;
  private readonly events: TransportEventQueue;
  private readonly renderer: Renderer;
  private readonly output: RenderOutput | null;
  private readonly logger: Logger;
  private readonly reconciler: PlayerStateReconciler;
  private lifecycleHandlers: ClientLifecycleHandlers | null = null;
  private booted = false;
  private lastTransportError: string | null = null;
  private logoutPromise: Promise<void> | null = null;

  constructor(
    public readonly configuration: ClientManagerConfiguration,
    dependencies: {
      session: Session;
      transport: Transport;
      events: TransportEventQueue;
      renderer: Renderer;
      output?: RenderOutput;
      logger?: Logger;
    },
  ) {
    this.session = dependencies.session;
    this.transport = dependencies.transport;
    this.events = dependencies.events;
    this.renderer = dependencies.renderer;
    this.output = dependencies.output ?? null;
    this.logger = dependencies.logger ?? silentLogger;
    this.reconciler = new PlayerStateReconciler({
      localUserId: this.session.userId,
      grid: configuration.grid,
      positionSendIntervalMs: configuration.positionSendIntervalMs,
      presentation: this.renderer,
      send: (message) => this.sendClientMessage(message),
      logger: this.logger.child("players"),
    });
  }

  boot(handlers: ClientLifecycleHandlers = {}): void {
    if (this.booted) {
      return;
    }
    this.booted = true;
    this.lifecycleHandlers = handlers;
    if (this.output) {
      this.renderer.mount(this.output);
    }
    this.renderer.setStatus(`Connecting to ${this.session.websocketUrl} ...`);
    this.events.attach((event) => this.handleTransportEvent(event));
    this.transport.start();
  }

  move(dx: number, dy: number): void {
    if (this.logoutPromise) {
      return;
    }
    this.reconciler.moveLocalBy(dx, dy);
  }

  requestExit(): void {
    this.logout().catch((error: unknown) => {
      this.reportError(error);
    });
  }

  logout(): Promise<void> {
    if (!this.logoutPromise) {
      this.logoutPromise = this.performLogout();
    }
    return this.logoutPromise;
  }

  snapshot(): ReconcilerSnapshot {
    return this.reconciler.snapshot();
  }

  private async performLogout(): Promise<void> {
    this.logger.info(`logging out user ${this.session.userId}`);
    this.reconciler.dispose();
    this.sendClientMessage(createLogoutMessage(this.session.userId));

    // Give the logout frame a chance to reach the server before the socket closes.
    await wait(this.configuration.logoutGraceMs);

    try {
      const closed = await this.transport.stop(this.configuration.stopTimeoutMs);
      if (!closed) {
        this.logger.warn("transport did not shut down in time");
      }
    } finally {
      this.events.detach();
      this.events.clear();
      this.renderer.unmount();
      const handlers = this.lifecycleHandlers;
      this.lifecycleHandlers = null;
      handlers?.onExit?.();
    }
  }

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.kind) {
      case "opened":
        this.lastTransportError = null;
        this.renderer.setStatus(CONNECTED_STATUS);
        this.lifecycleHandlers?.onConnected?.();
        return;
      case "closed":
        this.reconciler.handleConnectionClosed();
        this.renderer.setStatus(
          this.lastTransportError === null
            ? DISCONNECTED_STATUS
            : `${DISCONNECTED_STATUS} ${this.lastTransportError}`,
        );
        this.lifecycleHandlers?.onDisconnected?.(event.code, event.reason);
        return;
      case "message":
        this.handleFrame(event.text);
        return;
      case "error":
        this.lastTransportError = event.description;
        this.renderer.setStatus(`Connection error: ${event.description}`);
        this.reportError(new Error(event.description));
        return;
      case "sendFailed":
        // The transport already warned.
        this.logger.debug(`outgoing message dropped: ${event.description}`);
        return;
    }
  }

  private handleFrame(text: string): void {
    const result = decodeServerMessage(text);
    if (!result.ok) {
      this.logger.warn(`${result.error.name}: ${result.error.message}`, result.error.rawText);
      this.lifecycleHandlers?.onProtocolError?.(result.error);
      return;
    }
    this.reconciler.apply(result.message);
  }

  private sendClientMessage(message: ClientMessage): boolean {
    return this.transport.send(encodeClientMessage(message));
  }

  private reportError(error: unknown): void {
    const normalized = error instanceof Error ? error : new Error(String(error));
    this.logger.error(normalized.message);
    this.lifecycleHandlers?.onError?.(normalized);
  }
}
