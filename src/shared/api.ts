export type LeaderboardEntry = {
  initials: string;
  time: number; // seconds, 2 decimals
};

export type LeaderboardData = Record<string, LeaderboardEntry[]>;

export type LeaderboardResponse = {
  key: string;
  entries: LeaderboardEntry[];
};

export type AllLeaderboardsResponse = {
  leaderboards: LeaderboardData;
};

export type SubmitScoreRequest = {
  rows: number;
  cols: number;
  time: number;
  initials: string;
};

export type SubmitScoreResponse = {
  status: 'success';
  rank: number | null;
  message: string;
};

export type ErrorResponse = {
  status: 'error';
  message: string;
};

export type ProgramSummary = {
  id: string;
  label: string;
  description: string;
};

export type ProgramsResponse = {
  programs: ProgramSummary[];
};
