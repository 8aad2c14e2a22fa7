export type AppConfig = {
  leaderboardFile: string;
  recamanLogFile: string;
  recamanTerms: number;
  port: number;
  shuffleSeed: number | null;
  defaultRows: number;
  defaultCols: number;
  maxInitials: number;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: AppConfig = {
  leaderboardFile: 'data/sliding_puzzle_leaderboard.json',
  recamanLogFile: 'data/recaman.log',
  recamanTerms: 1000,
  port: 3000,
  shuffleSeed: null,
  defaultRows: 4,
  defaultCols: 6,
  maxInitials: 3,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readInteger(env: Env, name: string, min: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Builds the app configuration from environment variables, falling back to
 * defaults for anything unset
 */
export function loadConfig(env: Env): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    leaderboardFile: readString(env, 'LEADERBOARD_FILE') ?? DEFAULT_CONFIG.leaderboardFile,
    recamanLogFile: readString(env, 'RECAMAN_LOG_FILE') ?? DEFAULT_CONFIG.recamanLogFile,
    recamanTerms: readInteger(env, 'RECAMAN_TERMS', 1) ?? DEFAULT_CONFIG.recamanTerms,
    port: readInteger(env, 'PORT', 0) ?? DEFAULT_CONFIG.port,
    shuffleSeed: readInteger(env, 'SHUFFLE_SEED', 0) ?? DEFAULT_CONFIG.shuffleSeed,
  };
}
