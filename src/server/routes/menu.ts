import { Hono } from 'hono';
import type { ProgramSummary, ProgramsResponse } from '../../shared/api';

export function createMenu(programs: ProgramSummary[]): Hono {
  const menu = new Hono();

  menu.get('/programs', (c) => {
    return c.json<ProgramsResponse>({ programs });
  });

  return menu;
}
