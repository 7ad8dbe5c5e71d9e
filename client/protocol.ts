import type { Position } from "./grid";

export type InboundMessageType = "PlayerPosition" | "PlayerDisconnected" | "InitialPlayers";
export type OutboundMessageType = "PlayerPosition" | "PlayerLogout";

export interface PlayerPositionUpdate {
  readonly userId: number;
  readonly position: Position;
}

export interface PlayerPositionMessage {
  readonly type: "PlayerPosition";
  readonly payload: PlayerPositionUpdate;
}

export interface PlayerDisconnectedMessage {
  readonly type: "PlayerDisconnected";
  readonly payload: { readonly userId: number };
}

export interface InitialPlayersMessage {
  readonly type: "InitialPlayers";
  readonly payload: readonly PlayerPositionUpdate[];
}

export type ServerMessage = PlayerPositionMessage | PlayerDisconnectedMessage | InitialPlayersMessage;

export interface PlayerLogoutMessage {
  readonly type: "PlayerLogout";
  readonly payload: { readonly userId: number };
}

export type ClientMessage = PlayerPositionMessage | PlayerLogoutMessage;

export abstract class ProtocolError extends Error {
  protected constructor(
    message: string,
    public readonly rawText: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DecodeError extends ProtocolError {
  override readonly name = "DecodeError";

  constructor(rawText: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Frame is not valid JSON: ${reason}`, rawText, { cause });
  }
}

export class UnknownMessageError extends ProtocolError {
  override readonly name = "UnknownMessageError";

  constructor(rawText: string, public readonly messageType: string | null) {
    super(
      messageType === null
        ? "Frame has no message type."
        : `Unknown message type "${messageType}".`,
      rawText,
    );
  }
}

export class MalformedPayloadError extends ProtocolError {
  override readonly name = "MalformedPayloadError";

  constructor(
    public readonly kind: InboundMessageType,
    rawText: string,
    public readonly detail: string,
  ) {
    super(`Malformed ${kind} payload: ${detail}`, rawText);
  }
}

export type DecodeResult =
  | { readonly ok: true; readonly message: ServerMessage }
  | { readonly ok: false; readonly error: ProtocolError };

const inboundTypes: readonly InboundMessageType[] = ["PlayerPosition", "PlayerDisconnected", "InitialPlayers"];

const isInboundType = (value: string): value is InboundMessageType =>
  inboundTypes.some((type) => type === value);

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

class PayloadFieldError extends Error {}

const readUserId = (value: unknown, context: string): number => {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new PayloadFieldError(`${context} must be an integer.`);
  }
  return value;
};

const readFiniteNumber = (value: unknown, context: string): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new PayloadFieldError(`${context} must be a finite number.`);
  }
  return value;
};

const readOptionalFiniteNumber = (value: unknown, context: string, fallback: number): number =>
  value === undefined || value === null ? fallback : readFiniteNumber(value, context);

const normalizePositionUpdate = (value: unknown, context: string): PlayerPositionUpdate => {
  if (!isObject(value)) {
    throw new PayloadFieldError(`${context} must be an object.`);
  }
  return {
    userId: readUserId(value.user_id, `${context}.user_id`),
    position: {
      x: readFiniteNumber(value.x, `${context}.x`),
      y: readFiniteNumber(value.y, `${context}.y`),
      z: readOptionalFiniteNumber(value.z, `${context}.z`, 0),
    },
  };
};

const normalizeMessage = (type: InboundMessageType, payload: unknown): ServerMessage => {
  switch (type) {
    case "PlayerPosition":
      return { type, payload: normalizePositionUpdate(payload, "payload") };
    case "PlayerDisconnected": {
      if (!isObject(payload)) {
        throw new PayloadFieldError("payload must be an object.");
      }
      return { type, payload: { userId: readUserId(payload.user_id, "payload.user_id") } };
    }
    case "InitialPlayers": {
      if (payload === null || payload === undefined) {
        return { type, payload: [] };
      }
      if (!Array.isArray(payload)) {
        throw new PayloadFieldError("payload must be an array.");
      }
      return {
        type,
        payload: payload.map((entry, index) => normalizePositionUpdate(entry, `payload[${index}]`)),
      };
    }
  }
};

/**
 * Parses one text frame from the server. Failures come back as values so a
 * bad frame never tears down the connection.
 */
export const decodeServerMessage = (rawText: string): DecodeResult => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch (error) {
    return { ok: false, error: new DecodeError(rawText, error) };
  }

  if (!isObject(parsed) || typeof parsed.type !== "string") {
    return { ok: false, error: new UnknownMessageError(rawText, null) };
  }

  const type = parsed.type;
  if (!isInboundType(type)) {
    return { ok: false, error: new UnknownMessageError(rawText, type) };
  }

  try {
    return { ok: true, message: normalizeMessage(type, parsed.payload) };
  } catch (error) {
    if (error instanceof PayloadFieldError) {
      return { ok: false, error: new MalformedPayloadError(type, rawText, error.message) };
    }
    throw error;
  }
};

export const encodeClientMessage = (message: ClientMessage): string => {
  switch (message.type) {
    case "PlayerPosition": {
      const { userId, position } = message.payload;
      return JSON.stringify({
        type: message.type,
        payload: { user_id: userId, x: position.x, y: position.y, z: position.z },
      });
    }
    case "PlayerLogout":
      return JSON.stringify({ type: message.type, payload: { user_id: message.payload.userId } });
  }
};

export const createPositionMessage = (userId: number, position: Position): PlayerPositionMessage => ({
  type: "PlayerPosition",
  payload: { userId, position: { x: position.x, y: position.y, z: position.z } },
});

export const createLogoutMessage = (userId: number): PlayerLogoutMessage => ({
  type: "PlayerLogout",
  payload: { userId },
});
