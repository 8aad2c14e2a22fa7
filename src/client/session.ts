import type { LeaderboardEntry } from '../shared/api';
import type { Coordinate, Direction } from '../shared/geometry';
import { getDirectionTarget, makeMove, type PuzzleState, type Tile } from '../shared/puzzle';
import { shufflePuzzle } from '../shared/shuffle';
import type { RecordResult } from '../server/core/leaderboard';

export type PuzzleEvent =
  | { type: 'pointer'; row: number; col: number }
  | { type: 'direction'; direction: Direction };

/**
 * Whatever draws the puzzle and talks to the player
 */
export interface PuzzleView {
  present(tiles: readonly Tile[], empty: Coordinate, puzzle: PuzzleState): void;
  /** Asks for the player's initials; null when they decline */
  notifySolved(elapsedSeconds: number): Promise<string | null> | string | null;
  showWarning(message: string): void;
}

export interface ScoreStore {
  getEntries(rows: number, cols: number): LeaderboardEntry[];
  record(rows: number, cols: number, elapsedSeconds: number, initials: string): RecordResult;
}

export type SessionOptions = {
  rows: number;
  cols: number;
  store: ScoreStore;
  view: PuzzleView;
  now?: () => number;
  shuffle?: (rows: number, cols: number) => PuzzleState;
  maxInitials?: number;
};

export type SessionUpdate =
  | { accepted: false }
  | {
      accepted: true;
      solved?: {
        elapsedSeconds: number;
        record: RecordResult | null; // null when no initials were given
      };
    };

export class SessionDriver {
  private puzzle: PuzzleState;
  private leaderboard: LeaderboardEntry[] = [];
  private readonly store: ScoreStore;
  private readonly view: PuzzleView;
  private readonly now: () => number;
  private readonly maxInitials: number;

  constructor(options: SessionOptions) {
    const shuffle =
      options.shuffle ?? ((rows: number, cols: number) => shufflePuzzle(rows, cols).puzzle);
    this.puzzle = shuffle(options.rows, options.cols);
    this.store = options.store;
    this.view = options.view;
    this.now = options.now ?? Date.now;
    this.maxInitials = options.maxInitials ?? 3;
  }

  getState(): PuzzleState {
    return this.puzzle;
  }

  getLeaderboard(): LeaderboardEntry[] {
    return this.leaderboard;
  }

  start(): void {
    const { rows, cols } = this.puzzle.size;
    this.leaderboard = this.store.getEntries(rows, cols);
    this.present();
  }

  pointerActivated(row: number, col: number): Promise<SessionUpdate> {
    return this.handleEvent({ type: 'pointer', row, col });
  }

  directionKeyPressed(direction: Direction): Promise<SessionUpdate> {
    return this.handleEvent({ type: 'direction', direction });
  }

  async handleEvent(event: PuzzleEvent): Promise<SessionUpdate> {
    const target =
      event.type === 'pointer'
        ? { row: event.row, col: event.col }
        : getDirectionTarget(this.puzzle, event.direction);

    const result = makeMove(this.puzzle, target, this.now());
    if (!result) return { accepted: false };

    this.puzzle = result.puzzle;
    this.present();

    if (!result.solved) return { accepted: true };

    const { elapsedSeconds } = result.solved;
    const record = await this.recordSolve(elapsedSeconds);
    return { accepted: true, solved: { elapsedSeconds, record } };
  }

  private async recordSolve(elapsedSeconds: number): Promise<RecordResult | null> {
    const answer = await this.view.notifySolved(elapsedSeconds);
    const initials = answer?.trim().slice(0, this.maxInitials);
    if (!initials) return null;

    const { rows, cols } = this.puzzle.size;
    const record = this.store.record(rows, cols, elapsedSeconds, initials);
    this.leaderboard = record.entries;
    if (record.status === 'error') {
      this.view.showWarning(record.message);
    }
    return record;
  }

  private present(): void {
    this.view.present(this.puzzle.tiles, this.puzzle.empty, this.puzzle);
  }
}
