import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../utils/logger.js';
import { RateLimitError } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/clock.js';

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
  clock?: Clock;
}

interface WindowCounter {
  count: number;
  startedAt: number;
}

/**
 * Fixed-window request counter per client IP. In-memory, so limits are
 * per process.
 */
export function rateLimit(options: RateLimitOptions): RequestHandler {
  const clock = options.clock ?? systemClock;
  const counters = new Map<string, WindowCounter>();

  return (req: Request, res: Response, next: NextFunction): void => {
    const now = clock.now().getTime();
    const clientIp = req.ip ?? 'unknown';

    for (const [ip, counter] of counters) {
      if (counter.startedAt <= now - options.windowMs) {
        counters.delete(ip);
      }
    }

    const counter = counters.get(clientIp);
    if (!counter) {
      counters.set(clientIp, { count: 1, startedAt: now });
      next();
      return;
    }

    counter.count += 1;
    if (counter.count > options.limit) {
      const error = new RateLimitError(clientIp);
      logger.warn({ clientIp, count: counter.count }, 'Rate limit exceeded');
      res.status(error.statusCode).json({ status: 'error', message: error.message });
      return;
    }

    next();
  };
}
