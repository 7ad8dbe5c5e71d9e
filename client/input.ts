import type { Key } from "node:readline";

export type MoveDirection = "up" | "down" | "left" | "right";

export interface MoveVector {
  readonly dx: number;
  readonly dy: number;
}

export interface InputBindings {
  readonly movementKeys: Readonly<Record<string, MoveDirection>>;
  readonly exitKeys: readonly string[];
}

export interface MovementDispatcher {
  readonly move: (dx: number, dy: number) => void;
  readonly requestExit: () => void;
}

export type KeypressListener = (sequence: string | undefined, key: Key | undefined) => void;

/** The slice of a TTY read stream the controller needs. */
export interface KeypressSource {
  readonly isTTY?: boolean;
  readonly setRawMode?: (mode: boolean) => unknown;
  readonly on: (event: "keypress", listener: KeypressListener) => unknown;
  readonly off: (event: "keypress", listener: KeypressListener) => unknown;
  readonly resume?: () => unknown;
  readonly pause?: () => unknown;
}

export interface InputControllerConfiguration {
  readonly source: KeypressSource;
  readonly dispatcher: MovementDispatcher;
  readonly bindings: InputBindings;
}

export interface InputController {
  readonly register: () => void;
  readonly unregister: () => void;
}

export const DEFAULT_INPUT_BINDINGS: InputBindings = {
  movementKeys: {
    w: "up",
    up: "up",
    s: "down",
    down: "down",
    a: "left",
    left: "left",
    d: "right",
    right: "right",
  },
  exitKeys: ["q", "escape"],
};

const STEP = 1;

export const directionToVector = (direction: MoveDirection): MoveVector => {
  switch (direction) {
    case "up":
      return { dx: 0, dy: -STEP };
    case "down":
      return { dx: 0, dy: STEP };
    case "left":
      return { dx: -STEP, dy: 0 };
    case "right":
      return { dx: STEP, dy: 0 };
  }
};

const normalizeKey = (sequence: string | undefined, key: Key | undefined): string | null => {
  const name = key?.name ?? sequence;
  if (typeof name !== "string" || name.length === 0) {
    return null;
  }
  return name.toLowerCase();
};

export class KeyboardInputController implements InputController {
  private readonly movementKeyMap: Map<string, MoveDirection>;
  private readonly exitKeys: Set<string>;
  private registered = false;

  private readonly handleKeypress: KeypressListener = (sequence, key) => {
    if (!this.registered) {
      return;
    }

    if (key?.ctrl && key.name === "c") {
      this.configuration.dispatcher.requestExit();
      return;
    }
    if (key?.ctrl || key?.meta) {
      return;
    }

    const normalized = normalizeKey(sequence, key);
    if (normalized === null) {
      return;
    }

    if (this.exitKeys.has(normalized)) {
      this.configuration.dispatcher.requestExit();
      return;
    }

    const direction = this.movementKeyMap.get(normalized);
    if (!direction) {
      return;
    }
    const { dx, dy } = directionToVector(direction);
    this.configuration.dispatcher.move(dx, dy);
  };

  constructor(public readonly configuration: InputControllerConfiguration) {
    this.movementKeyMap = new Map(
      Object.entries(configuration.bindings.movementKeys).map(([key, direction]) => [key.toLowerCase(), direction]),
    );
    this.exitKeys = new Set(configuration.bindings.exitKeys.map((key) => key.toLowerCase()));
  }

  register(): void {
    if (this.registered) {
      return;
    }
    this.registered = true;
    const { source } = this.configuration;
    if (source.isTTY) {
      source.setRawMode?.(true);
    }
    source.on("keypress", this.handleKeypress);
    source.resume?.();
  }

  unregister(): void {
    if (!this.registered) {
      return;
    }
    this.registered = false;
    const { source } = this.configuration;
    source.off("keypress", this.handleKeypress);
    if (source.isTTY) {
      source.setRawMode?.(false);
    }
    source.pause?.();
  }
}
