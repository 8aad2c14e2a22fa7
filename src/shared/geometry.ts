export type Coordinate = {
  row: number;
  col: number;
};

export type GridSize = {
  rows: number;
  cols: number;
};

export type Direction = 'up' | 'down' | 'left' | 'right';

/**
 * Converts a row-major slot index into its (row, col) pair
 */
export function toCoordinate(index: number, cols: number): Coordinate {
  return { row: Math.floor(index / cols), col: index % cols };
}

/**
 * Converts a (row, col) pair into its row-major slot index
 */
export function toIndex(coord: Coordinate, cols: number): number {
  return coord.row * cols + coord.col;
}

export function isInBounds(coord: Coordinate, size: GridSize): boolean {
  return (
    Number.isInteger(coord.row) &&
    Number.isInteger(coord.col) &&
    coord.row >= 0 &&
    coord.row < size.rows &&
    coord.col >= 0 &&
    coord.col < size.cols
  );
}

export function manhattanDistance(a: Coordinate, b: Coordinate): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Gets the orthogonal neighbours of a cell that lie inside the grid
 */
export function getNeighbors(coord: Coordinate, size: GridSize): Coordinate[] {
  const { row, col } = coord;
  const neighbors: Coordinate[] = [];

  if (row > 0) neighbors.push({ row: row - 1, col }); // Up
  if (row < size.rows - 1) neighbors.push({ row: row + 1, col }); // Down
  if (col > 0) neighbors.push({ row, col: col - 1 }); // Left
  if (col < size.cols - 1) neighbors.push({ row, col: col + 1 }); // Right

  return neighbors;
}
