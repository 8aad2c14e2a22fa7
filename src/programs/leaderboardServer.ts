import type { Server } from 'node:net';
import { startServer } from '../server/index';
import { LeaderboardStore } from '../server/core/leaderboard';
import type { Program, ProgramContext } from './types';

export class LeaderboardServerProgram implements Program {
  constructor(private readonly context: ProgramContext) {}

  async run(): Promise<void> {
    const { config, output, catalog } = this.context;

    let server: Server;
    try {
      server = await startServer({
        store: new LeaderboardStore(config.leaderboardFile),
        programs: catalog,
        maxInitials: config.maxInitials,
        port: config.port,
      });
    } catch (error) {
      console.error(`[SERVER] Could not listen on port ${config.port}:`, error);
      throw error;
    }

    output.write('Press Ctrl-C to stop the server.\n');
    try {
      await waitForInterrupt(server);
    } catch (error) {
      console.error('[SERVER] Server failed:', error);
      server.close();
      throw error;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    console.log('[SERVER] Stopped');
  }
}

/**
 * Resolves on Ctrl-C, rejects if the server errors first
 */
function waitForInterrupt(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    const onInterrupt = () => {
      server.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      process.off('SIGINT', onInterrupt);
      reject(error);
    };
    process.once('SIGINT', onInterrupt);
    server.once('error', onError);
  });
}
