import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { LeaderboardEntry } from '../../shared/api';
import type { Coordinate } from '../../shared/geometry';
import {
  GridSizeError,
  createPuzzle,
  hasValidLayout,
  isSolved,
  slideTile,
  type PuzzleState,
  type Tile,
} from '../../shared/puzzle';
import { LeaderboardStore, type RecordResult } from '../../server/core/leaderboard';
import { SessionDriver, type PuzzleView, type ScoreStore } from '../session';

/** Solved layout with the tile left of the gap slid right; empty at (rows-1, cols-2) */
function oneMoveFromSolved(rows: number, cols: number): PuzzleState {
  return slideTile(createPuzzle(rows, cols), { row: rows - 1, col: cols - 2 });
}

class FakeView implements PuzzleView {
  presented: Array<{ tiles: readonly Tile[]; empty: Coordinate }> = [];
  solvedTimes: number[] = [];
  warnings: string[] = [];

  constructor(private readonly initials: string | null = 'AB') {}

  present(tiles: readonly Tile[], empty: Coordinate): void {
    this.presented.push({ tiles, empty });
  }

  notifySolved(elapsedSeconds: number): Promise<string | null> {
    this.solvedTimes.push(elapsedSeconds);
    return Promise.resolve(this.initials);
  }

  showWarning(message: string): void {
    this.warnings.push(message);
  }
}

class FakeStore implements ScoreStore {
  recorded: Array<{ rows: number; cols: number; elapsedSeconds: number; initials: string }> = [];

  constructor(
    private readonly entries: LeaderboardEntry[] = [],
    private readonly failWith: string | null = null
  ) {}

  getEntries(): LeaderboardEntry[] {
    return this.entries;
  }

  record(rows: number, cols: number, elapsedSeconds: number, initials: string): RecordResult {
    this.recorded.push({ rows, cols, elapsedSeconds, initials });
    const entries = [...this.entries, { initials, time: elapsedSeconds }];
    if (this.failWith) {
      return { status: 'error', message: this.failWith, entries };
    }
    return { status: 'success', rank: entries.length, entries };
  }
}

function createDriver(options: {
  view?: FakeView;
  store?: ScoreStore;
  clock?: { time: number };
  rows?: number;
  cols?: number;
}) {
  const rows = options.rows ?? 3;
  const cols = options.cols ?? 3;
  const clock = options.clock ?? { time: 0 };
  return new SessionDriver({
    rows,
    cols,
    store: options.store ?? new FakeStore(),
    view: options.view ?? new FakeView(),
    now: () => clock.time,
    shuffle: oneMoveFromSolved,
  });
}

describe('SessionDriver', () => {
  it('loads the leaderboard and presents the starting layout on start', () => {
    const view = new FakeView();
    const store = new FakeStore([{ initials: 'ZZZ', time: 9 }]);
    const driver = createDriver({ view, store });

    driver.start();

    expect(driver.getLeaderboard()).toEqual([{ initials: 'ZZZ', time: 9 }]);
    expect(view.presented).toHaveLength(1);
    expect(view.presented[0]?.empty).toEqual({ row: 2, col: 1 });
  });

  it('ignores a non-adjacent click', async () => {
    const view = new FakeView();
    const driver = createDriver({ view });
    driver.start();
    const before = driver.getState();

    expect(await driver.pointerActivated(0, 0)).toEqual({ accepted: false });
    expect(driver.getState()).toBe(before);
    expect(view.presented).toHaveLength(1);
  });

  it('times the session from the first accepted move and records the solve', async () => {
    const view = new FakeView('abcd ');
    const store = new FakeStore();
    const clock = { time: 0 };
    const driver = createDriver({ view, store, clock });
    driver.start();

    clock.time = 1000;
    expect(await driver.pointerActivated(1, 1)).toEqual({ accepted: true });
    expect(driver.getState().status).toBe('running');
    expect(driver.getState().startTime).toBe(1000);

    clock.time = 2000;
    expect(await driver.pointerActivated(2, 1)).toEqual({ accepted: true });
    expect(driver.getState().startTime).toBe(1000);

    clock.time = 4250;
    const update = await driver.pointerActivated(2, 2);

    expect(update).toEqual({
      accepted: true,
      solved: {
        elapsedSeconds: 3.25,
        record: { status: 'success', rank: 1, entries: [{ initials: 'abc', time: 3.25 }] },
      },
    });
    expect(view.solvedTimes).toEqual([3.25]);
    expect(store.recorded).toEqual([{ rows: 3, cols: 3, elapsedSeconds: 3.25, initials: 'abc' }]);
    expect(driver.getLeaderboard()).toEqual([{ initials: 'abc', time: 3.25 }]);
    expect(view.presented).toHaveLength(4);
    expect(isSolved(driver.getState())).toBe(true);
  });

  it('skips recording when the player declines to give initials', async () => {
    const store = new FakeStore();
    const driver = createDriver({ view: new FakeView(null), store });
    driver.start();

    const update = await driver.pointerActivated(2, 2);
    expect(update).toEqual({ accepted: true, solved: { elapsedSeconds: 0, record: null } });
    expect(store.recorded).toEqual([]);
  });

  it('warns the player when the score cannot be saved', async () => {
    const view = new FakeView('XY');
    const driver = createDriver({ view, store: new FakeStore([], 'disk full') });
    driver.start();

    await driver.pointerActivated(2, 2);
    expect(view.warnings).toEqual(['disk full']);
    expect(driver.getLeaderboard()).toEqual([{ initials: 'XY', time: 0 }]);
  });

  it('maps direction keys onto the neighbouring tile', async () => {
    const driver = createDriver({});
    driver.start();

    expect(await driver.directionKeyPressed('up')).toEqual({ accepted: false });
    const update = await driver.directionKeyPressed('left');
    expect(update.accepted).toBe(true);
    expect(driver.getState().status).toBe('solved');
  });

  it('ignores input once solved', async () => {
    const view = new FakeView();
    const driver = createDriver({ view });
    driver.start();
    await driver.handleEvent({ type: 'pointer', row: 2, col: 2 });

    expect(await driver.handleEvent({ type: 'pointer', row: 2, col: 1 })).toEqual({ accepted: false });
    expect(await driver.handleEvent({ type: 'direction', direction: 'right' })).toEqual({ accepted: false });
    expect(view.solvedTimes).toHaveLength(1);
  });

  it('shuffles a fresh layout by default', () => {
    const driver = new SessionDriver({ rows: 4, cols: 6, store: new FakeStore(), view: new FakeView() });
    const state = driver.getState();
    expect(isSolved(state)).toBe(false);
    expect(hasValidLayout(state)).toBe(true);
    expect(state.status).toBe('not-started');
  });

  it('rejects an invalid grid size', () => {
    expect(() => createDriver({ rows: 9 })).toThrow(GridSizeError);
  });
});

describe('SessionDriver with a file-backed leaderboard', () => {
  let dir: string | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists the rounded solve time', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-'));
    const store = new LeaderboardStore(path.join(dir, 'board.json'));
    const clock = { time: 10_000 };
    const driver = createDriver({ store, view: new FakeView('JD'), clock, rows: 4, cols: 4 });
    driver.start();

    await driver.pointerActivated(2, 2);
    clock.time = 22_345;
    await driver.pointerActivated(3, 2);
    clock.time = 22_346;
    await driver.pointerActivated(3, 3);

    expect(store.load()).toEqual({ '4x4': [{ initials: 'JD', time: 12.35 }] });
  });
});
