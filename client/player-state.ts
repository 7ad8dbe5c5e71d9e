import {
  ORIGIN,
  clampToGrid,
  shouldSendPosition,
  translate,
  type GridDimensions,
  type Position,
} from "./grid";
import { silentLogger, type Logger } from "./logger";
import {
  createPositionMessage,
  type ClientMessage,
  type PlayerPositionUpdate,
  type ServerMessage,
} from "./protocol";
import type { PresentationAdapter } from "./render";

export interface PlayerState {
  readonly id: number;
  readonly position: Position;
  readonly isLocal: boolean;
}

export interface ReconcilerSnapshot {
  readonly players: Map<number, PlayerState>;
  readonly localPosition: Position;
  readonly lastSentPosition: Position | null;
  readonly positionBroadcastActive: boolean;
}

export interface ReconcilerOptions {
  readonly localUserId: number;
  readonly grid: GridDimensions;
  readonly positionSendIntervalMs: number;
  readonly presentation: PresentationAdapter;
  /** Returns whether the message was handed to the connection. */
  readonly send: (message: ClientMessage) => boolean;
  readonly logger?: Logger;
}

const clonePosition = (position: Position): Position => ({ x: position.x, y: position.y, z: position.z });

const clonePlayer = (player: PlayerState): PlayerState => ({
  id: player.id,
  position: clonePosition(player.position),
  isLocal: player.isLocal,
});

/**
 * Client-side view of who is on the grid and where. Every mutation happens on
 * the thread of control that drains the transport queue, so nothing here is
 * locked. Each handler validates first and then applies the whole event.
 */
export class PlayerStateReconciler {
  private readonly players = new Map<number, PlayerState>();
  private localPosition: Position = ORIGIN;
  private lastSentPosition: Position | null = null;
  private positionBroadcastActive = false;
  private broadcastTimer: ReturnType<typeof setInterval> | null = null;
  private disposed = false;
  private readonly logger: Logger;

  constructor(private readonly options: ReconcilerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get localUserId(): number {
    return this.options.localUserId;
  }

  snapshot(): ReconcilerSnapshot {
    const players = new Map<number, PlayerState>();
    for (const [id, player] of this.players.entries()) {
      players.set(id, clonePlayer(player));
    }
    return {
      players,
      localPosition: clonePosition(this.localPosition),
      lastSentPosition: this.lastSentPosition ? clonePosition(this.lastSentPosition) : null,
      positionBroadcastActive: this.positionBroadcastActive,
    };
  }

  getPlayer(id: number): PlayerState | null {
    const player = this.players.get(id);
    return player ? clonePlayer(player) : null;
  }

  apply(message: ServerMessage): void {
    if (this.disposed) {
      return;
    }
    switch (message.type) {
      case "InitialPlayers":
        this.applyInitialPlayers(message.payload);
        return;
      case "PlayerPosition":
        this.applyPlayerPosition(message.payload);
        return;
      case "PlayerDisconnected":
        this.applyPlayerDisconnected(message.payload.userId);
        return;
    }
  }

  applyInitialPlayers(roster: readonly PlayerPositionUpdate[]): void {
    let sawLocal = false;
    for (const entry of roster) {
      if (entry.userId === this.localUserId) {
        this.localPosition = clonePosition(entry.position);
        sawLocal = true;
        this.logger.debug(`roster placed local player at (${entry.position.x}, ${entry.position.y}, ${entry.position.z})`);
      }
      this.upsertPlayer(entry.userId, entry.position);
    }

    if (sawLocal && !this.positionBroadcastActive) {
      this.startPositionBroadcast();
    }
  }

  applyPlayerPosition(update: PlayerPositionUpdate): void {
    if (update.userId === this.localUserId) {
      this.localPosition = clonePosition(update.position);
    }
    this.upsertPlayer(update.userId, update.position);
  }

  applyPlayerDisconnected(userId: number): void {
    if (userId === this.localUserId) {
      // Only an explicit logout takes the local player off the grid.
      this.logger.debug(`ignoring disconnect notice for local player ${userId}`);
      return;
    }
    if (!this.players.delete(userId)) {
      this.logger.debug(`disconnect notice for unknown player ${userId}`);
      return;
    }
    this.options.presentation.remove(userId);
  }

  /** Clamps the requested position to the grid, stores it and offers it to the server. */
  moveLocalTo(target: Position): Position {
    const position = clampToGrid(target, this.options.grid);
    this.localPosition = position;
    this.upsertPlayer(this.localUserId, position);
    this.flushLocalPosition();
    return clonePosition(position);
  }

  moveLocalBy(dx: number, dy: number): Position {
    return this.moveLocalTo(translate(this.localPosition, dx, dy));
  }

  /** Sends the local position unless the server was already told exactly this one. */
  flushLocalPosition(): boolean {
    if (this.disposed) {
      return false;
    }
    const current = this.localPosition;
    if (!shouldSendPosition(current, this.lastSentPosition)) {
      return false;
    }
    if (!this.options.send(createPositionMessage(this.localUserId, current))) {
      return false;
    }
    this.lastSentPosition = clonePosition(current);
    return true;
  }

  handleConnectionClosed(): void {
    this.stopPositionBroadcast();
    this.lastSentPosition = null;
  }

  /** Final. Later events and flushes are ignored. */
  dispose(): void {
    this.disposed = true;
    this.stopPositionBroadcast();
  }

  private upsertPlayer(id: number, position: Position): void {
    const isLocal = id === this.localUserId;
    const player: PlayerState = { id, position: clonePosition(position), isLocal };
    this.players.set(id, player);
    this.options.presentation.upsert(id, clonePosition(position), isLocal);
  }

  private startPositionBroadcast(): void {
    if (this.disposed) {
      return;
    }
    this.positionBroadcastActive = true;
    const interval = Math.max(1, Math.floor(this.options.positionSendIntervalMs));
    this.broadcastTimer = setInterval(() => {
      this.flushLocalPosition();
    }, interval);
    this.logger.debug(`position broadcast started every ${interval}ms`);
    this.flushLocalPosition();
  }

  private stopPositionBroadcast(): void {
    if (this.broadcastTimer !== null) {
      clearInterval(this.broadcastTimer);
      this.broadcastTimer = null;
    }
    this.positionBroadcastActive = false;
  }
}
