import type { GridSize } from '../shared/geometry';
import { GridSizeError, MAX_GRID_SIZE, MIN_GRID_SIZE, validateGridSize } from '../shared/puzzle';
import { ask, type TerminalInput } from './prompt';

function parseDimension(answer: string, fallback: number): number {
  const trimmed = answer.trim();
  return trimmed ? Number(trimmed) : fallback;
}

/**
 * Asks for the grid size until the player gives one in range
 */
export async function promptGridSize(
  input: TerminalInput,
  output: NodeJS.WritableStream,
  defaults: GridSize
): Promise<GridSize> {
  output.write('Sliding Puzzle Setup\n');

  for (;;) {
    const rows = parseDimension(
      await ask(input, output, `Rows (${MIN_GRID_SIZE}-${MAX_GRID_SIZE}) [${defaults.rows}]: `),
      defaults.rows
    );
    const cols = parseDimension(
      await ask(input, output, `Columns (${MIN_GRID_SIZE}-${MAX_GRID_SIZE}) [${defaults.cols}]: `),
      defaults.cols
    );

    try {
      return validateGridSize(rows, cols);
    } catch (error) {
      if (!(error instanceof GridSizeError)) throw error;
      output.write(`${error.message}\n`);
    }
  }
}
