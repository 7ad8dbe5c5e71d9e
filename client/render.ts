import { formatPosition, type GridDimensions, type Position } from "./grid";

/** Mirrors the reconciled player set at the view layer. Both calls are idempotent. */
export interface PresentationAdapter {
  readonly upsert: (id: number, position: Position, isLocal: boolean) => void;
  readonly remove: (id: number) => void;
}

export interface RendererConfiguration {
  readonly grid: GridDimensions;
  readonly cellWidth: number;
  readonly colors: boolean;
}

export interface RenderOutput {
  readonly write: (chunk: string) => unknown;
}

export interface Renderer extends PresentationAdapter {
  readonly configuration: RendererConfiguration;
  readonly mount: (output: RenderOutput) => void;
  readonly unmount: () => void;
  readonly setStatus: (message: string) => void;
}

export interface PlayerMarker {
  readonly id: number;
  readonly position: Position;
  readonly isLocal: boolean;
}

export interface FrameModel {
  readonly grid: GridDimensions;
  readonly cellWidth: number;
  readonly markers: readonly PlayerMarker[];
  readonly status: string;
}

const LOCAL_GLYPH = "@";
const REMOTE_GLYPH = "o";
const EMPTY_GLYPH = ".";

const ANSI_CLEAR = "\u001b[H\u001b[2J";
const ANSI_RED = "\u001b[31m";
const ANSI_BLUE = "\u001b[34m";
const ANSI_DIM = "\u001b[2m";
const ANSI_RESET = "\u001b[0m";

const paint = (text: string, color: string, colors: boolean): string =>
  colors ? `${color}${text}${ANSI_RESET}` : text;

const cellIndex = (position: Position, grid: GridDimensions): { column: number; row: number } | null => {
  const column = Math.floor(position.x);
  const row = Math.floor(position.y);
  if (column < 0 || row < 0 || column >= grid.width || row >= grid.height) {
    return null;
  }
  return { column, row };
};

/**
 * Lays the frame out as plain lines: the grid, the local position label,
 * a legend of remote players and the status line. The local player is drawn
 * last so it wins a shared cell.
 */
export const composeFrame = (model: FrameModel, colors = false): string[] => {
  const { grid, cellWidth } = model;
  const padding = " ".repeat(Math.max(0, cellWidth - 1));
  const rows: string[][] = Array.from({ length: grid.height }, () =>
    Array.from({ length: grid.width }, () => paint(EMPTY_GLYPH, ANSI_DIM, colors)),
  );

  const ordered = [...model.markers].sort((left, right) => {
    if (left.isLocal !== right.isLocal) {
      return left.isLocal ? 1 : -1;
    }
    return left.id - right.id;
  });

  for (const marker of ordered) {
    const cell = cellIndex(marker.position, grid);
    if (!cell) {
      continue;
    }
    rows[cell.row][cell.column] = marker.isLocal
      ? paint(LOCAL_GLYPH, ANSI_RED, colors)
      : paint(REMOTE_GLYPH, ANSI_BLUE, colors);
  }

  const lines = rows.map((row) => row.join(padding));
  const local = ordered.find((marker) => marker.isLocal);
  lines.push("");
  lines.push(`Your position: ${local ? formatPosition(local.position) : "unknown"}`);

  const remote = ordered.filter((marker) => !marker.isLocal);
  if (remote.length > 0) {
    lines.push(
      `Players: ${remote.map((marker) => `${marker.id} ${formatPosition(marker.position)}`).join(", ")}`,
    );
  }
  if (model.status.length > 0) {
    lines.push(model.status);
  }
  lines.push("Move with WASD or arrow keys, q to exit.");
  return lines;
};

export class TerminalRenderer implements Renderer {
  private output: RenderOutput | null = null;
  private readonly markers = new Map<number, PlayerMarker>();
  private status = "";

  constructor(public readonly configuration: RendererConfiguration) {
    if (!Number.isInteger(configuration.grid.width) || configuration.grid.width <= 0) {
      throw new Error("Renderer grid width must be a positive integer.");
    }
    if (!Number.isInteger(configuration.grid.height) || configuration.grid.height <= 0) {
      throw new Error("Renderer grid height must be a positive integer.");
    }
  }

  mount(output: RenderOutput): void {
    this.output = output;
    this.draw();
  }

  unmount(): void {
    this.output = null;
  }

  upsert(id: number, position: Position, isLocal: boolean): void {
    const previous = this.markers.get(id);
    if (
      previous &&
      previous.isLocal === isLocal &&
      previous.position.x === position.x &&
      previous.position.y === position.y &&
      previous.position.z === position.z
    ) {
      return;
    }
    this.markers.set(id, { id, position: { ...position }, isLocal });
    this.draw();
  }

  remove(id: number): void {
    if (!this.markers.delete(id)) {
      return;
    }
    this.draw();
  }

  setStatus(message: string): void {
    if (this.status === message) {
      return;
    }
    this.status = message;
    this.draw();
  }

  getMarkers(): PlayerMarker[] {
    return [...this.markers.values()].map((marker) => ({ ...marker, position: { ...marker.position } }));
  }

  getStatus(): string {
    return this.status;
  }

  private draw(): void {
    const output = this.output;
    if (!output) {
      return;
    }
    const lines = composeFrame(
      {
        grid: this.configuration.grid,
        cellWidth: this.configuration.cellWidth,
        markers: [...this.markers.values()],
        status: this.status,
      },
      this.configuration.colors,
    );
    output.write(`${ANSI_CLEAR}${lines.join("\n")}\n`);
  }
}
