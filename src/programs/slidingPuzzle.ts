import { SessionDriver } from '../client/session';
import { promptGridSize } from '../client/splash';
import { TerminalView, formatLeaderboard, runTerminalSession } from '../client/terminal';
import { LeaderboardStore, getSizeKey } from '../server/core/leaderboard';
import type { PuzzleState } from '../shared/puzzle';
import { createSeededRandom, shufflePuzzle } from '../shared/shuffle';
import type { Program, ProgramContext } from './types';

export class SlidingPuzzleProgram implements Program {
  constructor(private readonly context: ProgramContext) {}

  async run(): Promise<void> {
    const { config, input, output } = this.context;
    const { rows, cols } = await promptGridSize(input, output, {
      rows: config.defaultRows,
      cols: config.defaultCols,
    });

    const driver = new SessionDriver({
      rows,
      cols,
      store: new LeaderboardStore(config.leaderboardFile),
      view: new TerminalView(input, output),
      shuffle: this.createShuffle(),
      maxInitials: config.maxInitials,
    });

    const end = await runTerminalSession(driver, input, output);
    if (end === 'solved') {
      output.write(`\n${formatLeaderboard(getSizeKey(rows, cols), driver.getLeaderboard())}\n`);
    }
  }

  private createShuffle(): ((rows: number, cols: number) => PuzzleState) | undefined {
    const seed = this.context.config.shuffleSeed;
    if (seed === null) return undefined;
    return (rows, cols) => shufflePuzzle(rows, cols, { random: createSeededRandom(seed) }).puzzle;
  }
}
