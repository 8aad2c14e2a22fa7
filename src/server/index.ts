import type { Server } from 'node:net';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import type { ErrorResponse, ProgramSummary } from '../shared/api';
import type { LeaderboardStore } from './core/leaderboard';
import { createApi } from './routes/api';
import { createMenu } from './routes/menu';

export type ServerOptions = {
  store: LeaderboardStore;
  programs: ProgramSummary[];
  maxInitials: number;
};

export function createServerApp(options: ServerOptions): Hono {
  const app = new Hono();

  app.route('/api', createApi(options.store, { maxInitials: options.maxInitials }));
  app.route('/menu', createMenu(options.programs));

  app.onError((error, c) => {
    console.error('[SERVER] Unhandled error:', error);
    return c.json<ErrorResponse>({ status: 'error', message: error.message }, 500);
  });

  return app;
}

/**
 * Resolves once the port is bound; rejects with the listen error (EADDRINUSE, EACCES)
 */
export function startServer(options: ServerOptions & { port: number }): Promise<Server> {
  const app = createServerApp(options);

  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, port: options.port }, (info) => {
      server.off('error', reject);
      console.log(`[SERVER] Leaderboard service listening on http://localhost:${info.port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
