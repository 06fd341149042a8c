/**
 * Stats API Routes
 *
 * GET /admin/stats - Usage figures of the live session store
 */

import { Router, type Request, type Response } from 'express';
import type { SessionStore } from '../../session/store.js';
import type { SessionStats } from '../../session/types.js';

export interface StatsResponse extends SessionStats {
  generatedAt: string;
}

export function createStatsRouter(store: SessionStore): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const response: StatsResponse = {
      ...store.stats(),
      generatedAt: new Date().toISOString(),
    };
    res.json(response);
  });

  return router;
}
