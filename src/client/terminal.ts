import * as readline from 'node:readline';
import type { LeaderboardEntry } from '../shared/api';
import type { Coordinate, Direction } from '../shared/geometry';
import type { PuzzleState, Tile } from '../shared/puzzle';
import { ask, type TerminalInput } from './prompt';
import type { PuzzleView, SessionDriver } from './session';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HELP_TEXT = 'Arrow keys slide a tile into the gap. Press q to quit.';

const DIRECTION_KEYS: Record<string, Direction> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
};

type Keypress = {
  name?: string;
  ctrl?: boolean;
};

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

/**
 * Draws the grid as text. Each tile shows its 1-based solved position.
 */
export function renderBoard(puzzle: PuzzleState): string {
  const { rows, cols } = puzzle.size;
  const width = String(rows * cols).length;
  const lines: string[] = [];

  for (let row = 0; row < rows; row++) {
    let line = '';
    for (let col = 0; col < cols; col++) {
      const tile = puzzle.tiles[row * cols + col];
      const label = tile ? String(tile.row * cols + tile.col + 1) : '';
      line += `[${label.padStart(width)}]`;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

export function formatLeaderboard(key: string, entries: LeaderboardEntry[]): string {
  if (entries.length === 0) {
    return `No times recorded for ${key} yet.`;
  }
  const lines = entries.map(
    (entry, i) =>
      `${String(i + 1).padStart(2)}. ${entry.initials.padEnd(3)} ${formatSeconds(entry.time)}`
  );
  return [`Top times for ${key}:`, ...lines].join('\n');
}

export class TerminalView implements PuzzleView {
  constructor(
    private readonly input: TerminalInput,
    private readonly output: NodeJS.WritableStream
  ) {}

  present(_tiles: readonly Tile[], _empty: Coordinate, puzzle: PuzzleState): void {
    this.output.write(`${CLEAR_SCREEN}${renderBoard(puzzle)}\n\n${HELP_TEXT}\n`);
  }

  async notifySolved(elapsedSeconds: number): Promise<string | null> {
    this.output.write(`\nSolved in ${formatSeconds(elapsedSeconds)}!\n`);
    this.input.setRawMode?.(false);
    const answer = await ask(this.input, this.output, 'Enter your initials (blank to skip): ');
    return answer.trim() || null;
  }

  showWarning(message: string): void {
    this.output.write(`Warning: ${message}\n`);
  }
}

export type SessionEnd = 'solved' | 'quit';

/**
 * Feeds arrow keys into the driver until the puzzle is solved or the player quits
 */
export function runTerminalSession(
  driver: SessionDriver,
  input: TerminalInput,
  output: NodeJS.WritableStream
): Promise<SessionEnd> {
  return new Promise((resolve, reject) => {
    let busy = false;

    const finish = (end: SessionEnd) => {
      input.removeListener('keypress', onKeypress);
      input.setRawMode?.(false);
      input.pause();
      resolve(end);
    };

    const onKeypress = (_chunk: string | undefined, key: Keypress | undefined) => {
      if (busy || !key?.name) return;

      if (key.name === 'q' || key.name === 'escape' || (key.ctrl && key.name === 'c')) {
        output.write('\nPuzzle abandoned.\n');
        finish('quit');
        return;
      }

      const direction = DIRECTION_KEYS[key.name];
      if (!direction) return;

      busy = true;
      driver
        .directionKeyPressed(direction)
        .then((update) => {
          busy = false;
          if (update.accepted && update.solved) {
            finish('solved');
          }
        })
        .catch((error: unknown) => {
          input.removeListener('keypress', onKeypress);
          input.setRawMode?.(false);
          reject(error);
        });
    };

    readline.emitKeypressEvents(input);
    input.setRawMode?.(true);
    input.on('keypress', onKeypress);
    input.resume();

    driver.start();
  });
}
