import {
  isInBounds,
  manhattanDistance,
  sameCoordinate,
  toCoordinate,
  toIndex,
  type Coordinate,
  type Direction,
  type GridSize,
} from './geometry';

export const MIN_GRID_SIZE = 3;
export const MAX_GRID_SIZE = 8;

/** A tile's solved-state coordinate, or null for the empty slot */
export type Tile = Coordinate | null;

export type SessionStatus = 'not-started' | 'running' | 'solved';

export type PuzzleState = {
  size: GridSize;
  tiles: Tile[];
  empty: Coordinate;
  status: SessionStatus;
  startTime: number | null; // epoch ms of the first accepted move
};

export type SolvedOutcome = {
  elapsedSeconds: number;
};

export type MoveResult = {
  puzzle: PuzzleState;
  solved: SolvedOutcome | null;
};

export class GridSizeError extends Error {
  constructor(
    readonly rows: number,
    readonly cols: number
  ) {
    super(
      `Grid size must be between ${MIN_GRID_SIZE} and ${MAX_GRID_SIZE} in each dimension, got ${rows}x${cols}`
    );
    this.name = 'GridSizeError';
  }
}

function isValidDimension(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_GRID_SIZE && value <= MAX_GRID_SIZE;
}

/**
 * Checks grid dimensions, throwing GridSizeError when either is out of range
 */
export function validateGridSize(rows: number, cols: number): GridSize {
  if (!isValidDimension(rows) || !isValidDimension(cols)) {
    throw new GridSizeError(rows, cols);
  }
  return { rows, cols };
}

/**
 * The slot the empty marker occupies when the puzzle is solved (bottom-right)
 */
export function getTerminalCoordinate(size: GridSize): Coordinate {
  return { row: size.rows - 1, col: size.cols - 1 };
}

/**
 * Creates the solved layout for a grid, ready to be shuffled
 */
export function createPuzzle(rows: number, cols: number): PuzzleState {
  const size = validateGridSize(rows, cols);
  const terminalIndex = rows * cols - 1;
  const tiles = Array.from({ length: rows * cols }, (_, i): Tile =>
    i === terminalIndex ? null : toCoordinate(i, cols)
  );

  return {
    size,
    tiles,
    empty: getTerminalCoordinate(size),
    status: 'not-started',
    startTime: null,
  };
}

/**
 * Checks if a target cell can slide into the empty slot
 */
export function isValidMove(puzzle: PuzzleState, target: Coordinate): boolean {
  if (puzzle.status === 'solved') return false;
  if (!isInBounds(target, puzzle.size)) return false;
  return manhattanDistance(puzzle.empty, target) === 1;
}

/**
 * Swaps the empty marker with the tile at target. No validation, timing or
 * solved detection; callers check adjacency first.
 */
export function slideTile(puzzle: PuzzleState, target: Coordinate): PuzzleState {
  const { cols } = puzzle.size;
  const emptyIndex = toIndex(puzzle.empty, cols);
  const targetIndex = toIndex(target, cols);

  const tiles = [...puzzle.tiles];
  tiles[emptyIndex] = tiles[targetIndex] ?? null;
  tiles[targetIndex] = null;

  return {
    ...puzzle,
    tiles,
    empty: { row: target.row, col: target.col },
  };
}

/**
 * Makes a move if valid. Returns null for an illegal move, otherwise the new
 * state and, when this move finished the puzzle, the elapsed time.
 */
export function makeMove(
  puzzle: PuzzleState,
  target: Coordinate,
  now: number
): MoveResult | null {
  if (!isValidMove(puzzle, target)) {
    return null;
  }

  const startTime = puzzle.startTime ?? now;
  const moved: PuzzleState = {
    ...slideTile(puzzle, target),
    status: 'running',
    startTime,
  };

  if (!isSolved(moved)) {
    return { puzzle: moved, solved: null };
  }

  return {
    puzzle: { ...moved, status: 'solved' },
    solved: { elapsedSeconds: (now - startTime) / 1000 },
  };
}

/**
 * Checks if the puzzle is solved
 */
export function isSolved(puzzle: PuzzleState): boolean {
  const { rows, cols } = puzzle.size;
  const terminalIndex = rows * cols - 1;

  return puzzle.tiles.every((tile, index) => {
    if (index === terminalIndex) return tile === null;
    return tile !== null && sameCoordinate(tile, toCoordinate(index, cols));
  });
}

/**
 * The cell a direction key acts on: the tile that slides in the arrow's
 * direction, so "up" takes the tile below the empty slot.
 */
export function getDirectionTarget(puzzle: PuzzleState, direction: Direction): Coordinate {
  const { row, col } = puzzle.empty;
  switch (direction) {
    case 'up':
      return { row: row + 1, col };
    case 'down':
      return { row: row - 1, col };
    case 'left':
      return { row, col: col + 1 };
    case 'right':
      return { row, col: col - 1 };
  }
}

/**
 * Checks the layout invariant: every coordinate but the terminal one appears
 * exactly once, there is one empty slot, and the cached empty position points at it.
 */
export function hasValidLayout(puzzle: PuzzleState): boolean {
  const { rows, cols } = puzzle.size;
  if (puzzle.tiles.length !== rows * cols) return false;

  const terminal = getTerminalCoordinate(puzzle.size);
  const seen = new Set<number>();
  let emptyCount = 0;

  for (let i = 0; i < puzzle.tiles.length; i++) {
    const tile = puzzle.tiles[i];
    if (tile === undefined) return false;
    if (tile === null) {
      emptyCount++;
      if (i !== toIndex(puzzle.empty, cols)) return false;
      continue;
    }
    if (!isInBounds(tile, puzzle.size) || sameCoordinate(tile, terminal)) return false;
    const key = toIndex(tile, cols);
    if (seen.has(key)) return false;
    seen.add(key);
  }

  return emptyCount === 1 && seen.size === rows * cols - 1;
}
