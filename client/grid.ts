export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface GridDimensions {
  readonly width: number;
  readonly height: number;
}

// Must match the server's map size.
export const GRID_DIMENSIONS: GridDimensions = {
  width: 40,
  height: 20,
};

export const ORIGIN: Position = { x: 0, y: 0, z: 0 };

const clamp = (value: number, min: number, max: number): number => {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

/**
 * Keeps x and y inside `[0, width - 1] × [0, height - 1]`. The z axis is not
 * bounded by the grid and passes through untouched.
 */
export const clampToGrid = (position: Position, grid: GridDimensions): Position => ({
  x: clamp(position.x, 0, Math.max(0, grid.width - 1)),
  y: clamp(position.y, 0, Math.max(0, grid.height - 1)),
  z: position.z,
});

export const positionsEqual = (left: Position, right: Position): boolean =>
  left.x === right.x && left.y === right.y && left.z === right.z;

/**
 * Moves happen in whole unit steps, so exact comparison is enough to tell
 * whether the server already has this position.
 */
export const shouldSendPosition = (current: Position, lastSent: Position | null): boolean =>
  lastSent === null || !positionsEqual(current, lastSent);

export const translate = (position: Position, dx: number, dy: number): Position => ({
  x: position.x + dx,
  y: position.y + dy,
  z: position.z,
});

export const formatPosition = (position: Position): string =>
  `(${Math.trunc(position.x)}, ${Math.trunc(position.y)})`;
