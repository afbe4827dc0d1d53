/**
 * Health Routes
 */

import type { Request, Response, Router } from 'express';

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
}

export interface HealthRoutesOptions {
  now?: () => Date;
}

export function setupHealthRoutes(router: Router, options: HealthRoutesOptions = {}): void {
  const now = options.now ?? (() => new Date());

  router.get('/health', (_req: Request, res: Response) => {
    const body: HealthResponse = { status: 'healthy', timestamp: now().toISOString() };
    res.json(body);
  });
}
