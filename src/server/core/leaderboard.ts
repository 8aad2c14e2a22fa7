import fs from 'node:fs';
import path from 'node:path';
import type { LeaderboardData, LeaderboardEntry } from '../../shared/api';

export const MAX_LEADERBOARD_ENTRIES = 10;

export type RecordResult =
  | {
      status: 'success';
      rank: number | null; // null when the time missed the top 10
      entries: LeaderboardEntry[];
    }
  | {
      status: 'error';
      message: string;
      entries: LeaderboardEntry[];
    };

export function getSizeKey(rows: number, cols: number): string {
  return `${rows}x${cols}`;
}

export function roundTime(seconds: number): number {
  return Math.round(seconds * 100) / 100;
}

function isLeaderboardEntry(value: unknown): value is LeaderboardEntry {
  if (!value || typeof value !== 'object') return false;
  return (
    'initials' in value &&
    typeof value.initials === 'string' &&
    'time' in value &&
    typeof value.time === 'number' &&
    Number.isFinite(value.time)
  );
}

type LeaderboardDocument = Record<string, unknown>;

function parseDocument(text: string): LeaderboardDocument {
  if (!text.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    console.warn('[LEADERBOARD] Ignoring unparsable leaderboard file:', error);
    return {};
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    console.warn('[LEADERBOARD] Ignoring leaderboard file without a top-level object');
    return {};
  }

  return { ...parsed };
}

function readEntries(value: unknown): LeaderboardEntry[] {
  return Array.isArray(value) ? value.filter(isLeaderboardEntry) : [];
}

function toLeaderboardData(document: LeaderboardDocument): LeaderboardData {
  const data: LeaderboardData = {};
  for (const [key, value] of Object.entries(document)) {
    if (Array.isArray(value)) data[key] = readEntries(value);
  }
  return data;
}

/**
 * Parses a leaderboard document. Anything that is not an object of entry lists
 * comes back empty; malformed entries are dropped. Valid entries keep any extra
 * fields they carry.
 */
export function parseLeaderboard(text: string): LeaderboardData {
  return toLeaderboardData(parseDocument(text));
}

/**
 * Top-10 completion times per grid size, kept in a single JSON file
 */
export class LeaderboardStore {
  constructor(readonly filePath: string) {}

  load(): LeaderboardData {
    return toLeaderboardData(this.readDocument());
  }

  getEntries(rows: number, cols: number): LeaderboardEntry[] {
    return this.load()[getSizeKey(rows, cols)] ?? [];
  }

  /**
   * Adds a time for a grid size, keeps the 10 fastest and rewrites the file.
   * Other keys in the file are written back untouched.
   */
  record(rows: number, cols: number, elapsedSeconds: number, initials: string): RecordResult {
    const key = getSizeKey(rows, cols);
    const document = this.readDocument();

    const entry: LeaderboardEntry = { initials, time: roundTime(elapsedSeconds) };
    const entries = [...readEntries(document[key]), entry]
      .sort((a, b) => a.time - b.time)
      .slice(0, MAX_LEADERBOARD_ENTRIES);
    document[key] = entries;

    const index = entries.indexOf(entry);
    const rank = index >= 0 ? index + 1 : null;

    try {
      this.write(document);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`[LEADERBOARD] Failed to save ${key} score for ${initials}:`, error);
      return {
        status: 'error',
        message: `Could not save your score: ${errorMessage}`,
        entries,
      };
    }

    console.log(`[LEADERBOARD] Recorded ${entry.time}s for ${initials} on ${key} (rank ${rank ?? '-'})`);
    return { status: 'success', rank, entries };
  }

  private readDocument(): LeaderboardDocument {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(`[LEADERBOARD] Could not read ${this.filePath}:`, error);
      }
      return {};
    }
    return parseDocument(text);
  }

  private write(document: LeaderboardDocument): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2) + '\n');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
