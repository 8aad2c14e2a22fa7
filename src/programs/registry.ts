import type { ProgramSummary } from '../shared/api';
import { LeaderboardServerProgram } from './leaderboardServer';
import { RecamanProgram } from './recaman';
import { SlidingPuzzleProgram } from './slidingPuzzle';
import type { ProgramDefinition } from './types';

/** Menu order is registry order */
export const PROGRAMS: readonly ProgramDefinition[] = [
  {
    id: 'sliding-puzzle',
    label: 'Sliding Puzzle',
    description: 'Slide the tiles back into order against the clock',
    create: (context) => new SlidingPuzzleProgram(context),
  },
  {
    id: 'recaman',
    label: "Recaman's Sequence",
    description: "Print the first terms of Recaman's sequence and log the run",
    create: (context) => new RecamanProgram(context),
  },
  {
    id: 'leaderboard-server',
    label: 'Leaderboard Server',
    description: 'Serve the sliding puzzle leaderboard over HTTP',
    create: (context) => new LeaderboardServerProgram(context),
  },
];

export function listPrograms(): ProgramSummary[] {
  return PROGRAMS.map(({ id, label, description }) => ({ id, label, description }));
}

/**
 * Finds a program by id or by its 1-based menu number
 */
export function findProgram(selection: string): ProgramDefinition | undefined {
  const trimmed = selection.trim();
  if (/^\d+$/.test(trimmed)) {
    return PROGRAMS[Number(trimmed) - 1];
  }
  return PROGRAMS.find((program) => program.id === trimmed);
}

export function formatMenu(): string {
  const lines = PROGRAMS.map((program, i) => `${i + 1}. ${program.label}`);
  return ['========================', '        MAIN MENU', '========================', ...lines, '0. Exit'].join('\n');
}
