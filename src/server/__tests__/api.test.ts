import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServerApp } from '../index';
import { LeaderboardStore } from '../core/leaderboard';

const programs = [{ id: 'sliding-puzzle', label: 'Sliding Puzzle', description: 'Slide tiles' }];

function postScore(app: ReturnType<typeof createServerApp>, body: string) {
  return app.request('/api/submit-score', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('leaderboard API', () => {
  let dir: string;
  let app: ReturnType<typeof createServerApp>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leaderboard-api-'));
    const store = new LeaderboardStore(path.join(dir, 'board.json'));
    app = createServerApp({ store, programs, maxInitials: 3 });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns an empty leaderboard for an unplayed size', async () => {
    const res = await app.request('/api/leaderboard?rows=3&cols=3');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ key: '3x3', entries: [] });
  });

  it('rejects an out-of-range size', async () => {
    const res = await app.request('/api/leaderboard?rows=9&cols=3');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ status: 'error' });
  });

  it('records a submitted score', async () => {
    const res = await postScore(
      app,
      JSON.stringify({ rows: 4, cols: 5, time: 31.416, initials: ' ABCD ' })
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'success',
      rank: 1,
      message: 'Score submitted successfully',
    });

    const board = await app.request('/api/leaderboard?rows=4&cols=5');
    expect(await board.json()).toEqual({
      key: '4x5',
      entries: [{ initials: 'ABC', time: 31.42 }],
    });

    const all = await app.request('/api/leaderboards');
    expect(await all.json()).toEqual({
      leaderboards: { '4x5': [{ initials: 'ABC', time: 31.42 }] },
    });
  });

  it('rejects malformed submissions', async () => {
    const notJson = await postScore(app, '{rows:');
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({ status: 'error', message: 'Request body must be JSON' });

    const missing = await postScore(app, JSON.stringify({ rows: 3, cols: 3 }));
    expect(missing.status).toBe(400);

    const blank = await postScore(app, JSON.stringify({ rows: 3, cols: 3, time: 5, initials: '  ' }));
    expect(blank.status).toBe(400);
    expect(await blank.json()).toEqual({ status: 'error', message: 'Initials are required' });

    const badSize = await postScore(app, JSON.stringify({ rows: 2, cols: 3, time: 5, initials: 'AB' }));
    expect(badSize.status).toBe(400);
  });

  it('lists the registered programs', async () => {
    const res = await app.request('/menu/programs');
    expect(await res.json()).toEqual({ programs });
  });
});
