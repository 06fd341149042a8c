import { Router, type Request, type Response } from 'express';

export function createHealthRouter(version: string): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', version });
  });

  return router;
}
