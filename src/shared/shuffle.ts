import { getNeighbors, type Coordinate, type GridSize } from './geometry';
import { createPuzzle, isSolved, slideTile, type PuzzleState } from './puzzle';

export type RandomSource = () => number;

export type ShuffleOptions = {
  random?: RandomSource;
  moveCount?: number;
};

export type ShuffleResult = {
  puzzle: PuzzleState;
  moves: Coordinate[]; // every cell the empty slot moved to, in order
};

/**
 * Creates a seeded random number generator using a simple LCG
 */
export function createSeededRandom(seed: number): RandomSource {
  let currentSeed = seed;
  return () => {
    // Linear Congruential Generator
    currentSeed = (currentSeed * 1664525 + 1013904223) % 2 ** 32;
    return currentSeed / 2 ** 32;
  };
}

/**
 * Length of the shuffle walk. Scales with area times perimeter so larger grids
 * end up as scrambled as small ones.
 */
export function getShuffleMoveCount(size: GridSize): number {
  return size.rows * size.cols * (size.rows + size.cols) * 2;
}

function pickNeighbor(puzzle: PuzzleState, random: RandomSource): Coordinate {
  const neighbors = getNeighbors(puzzle.empty, puzzle.size);
  const index = Math.min(Math.floor(random() * neighbors.length), neighbors.length - 1);
  const picked = neighbors[index];
  if (!picked) {
    throw new Error(`No neighbours for empty cell ${puzzle.empty.row},${puzzle.empty.col}`);
  }
  return picked;
}

/**
 * Creates a solvable shuffled puzzle by walking the empty slot through random
 * legal moves from the solved layout. Reversing `moves` always solves it.
 *
 * A walk that ends on the solved layout keeps going until it does not, so a
 * session never starts out already solved.
 */
export function shufflePuzzle(
  rows: number,
  cols: number,
  options: ShuffleOptions = {}
): ShuffleResult {
  let puzzle = createPuzzle(rows, cols);
  const random = options.random ?? Math.random;
  const moveCount = options.moveCount ?? getShuffleMoveCount(puzzle.size);
  const moves: Coordinate[] = [];

  const step = () => {
    const target = pickNeighbor(puzzle, random);
    puzzle = slideTile(puzzle, target);
    moves.push(target);
  };

  for (let i = 0; i < moveCount; i++) {
    step();
  }
  while (isSolved(puzzle)) {
    step();
  }

  return {
    puzzle: { ...puzzle, status: 'not-started', startTime: null },
    moves,
  };
}
