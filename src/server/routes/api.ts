import { Hono } from 'hono';
import type {
  AllLeaderboardsResponse,
  ErrorResponse,
  LeaderboardResponse,
  SubmitScoreRequest,
  SubmitScoreResponse,
} from '../../shared/api';
import { GridSizeError, validateGridSize } from '../../shared/puzzle';
import { getSizeKey, type LeaderboardStore } from '../core/leaderboard';

export type ApiOptions = {
  maxInitials: number;
};

function isSubmitScoreRequest(body: unknown): body is SubmitScoreRequest {
  if (!body || typeof body !== 'object') return false;
  return (
    'rows' in body &&
    typeof body.rows === 'number' &&
    'cols' in body &&
    typeof body.cols === 'number' &&
    'time' in body &&
    typeof body.time === 'number' &&
    Number.isFinite(body.time) &&
    body.time >= 0 &&
    'initials' in body &&
    typeof body.initials === 'string'
  );
}

export function createApi(store: LeaderboardStore, options: ApiOptions): Hono {
  const api = new Hono();

  /**
   * Get the top times for one grid size
   */
  api.get('/leaderboard', (c) => {
    const rows = Number(c.req.query('rows'));
    const cols = Number(c.req.query('cols'));

    try {
      validateGridSize(rows, cols);
    } catch (error) {
      if (error instanceof GridSizeError) {
        return c.json<ErrorResponse>({ status: 'error', message: error.message }, 400);
      }
      throw error;
    }

    return c.json<LeaderboardResponse>({
      key: getSizeKey(rows, cols),
      entries: store.getEntries(rows, cols),
    });
  });

  api.get('/leaderboards', (c) => {
    return c.json<AllLeaderboardsResponse>({ leaderboards: store.load() });
  });

  /**
   * Submit a completion time to the leaderboard
   */
  api.post('/submit-score', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch {
      return c.json<ErrorResponse>({ status: 'error', message: 'Request body must be JSON' }, 400);
    }

    if (!isSubmitScoreRequest(body)) {
      return c.json<ErrorResponse>(
        {
          status: 'error',
          message: 'Missing required fields: rows, cols, time, initials',
        },
        400
      );
    }

    const { rows, cols, time } = body;
    const initials = body.initials.trim().slice(0, options.maxInitials);
    if (!initials) {
      return c.json<ErrorResponse>({ status: 'error', message: 'Initials are required' }, 400);
    }

    try {
      validateGridSize(rows, cols);
    } catch (error) {
      if (error instanceof GridSizeError) {
        return c.json<ErrorResponse>({ status: 'error', message: error.message }, 400);
      }
      throw error;
    }

    const result = store.record(rows, cols, time, initials);
    if (result.status === 'error') {
      return c.json<ErrorResponse>({ status: 'error', message: result.message }, 500);
    }

    return c.json<SubmitScoreResponse>({
      status: 'success',
      rank: result.rank,
      message: result.rank === null ? 'Not fast enough for the top 10' : 'Score submitted successfully',
    });
  });

  return api;
}
