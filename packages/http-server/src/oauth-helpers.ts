import type { Request, Response } from 'express';

/**
 * Set anti-caching headers for OAuth endpoints (RFC 6749, RFC 9700)
 */
export function setOAuthAntiCachingHeaders(res: Response): void {
  res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, private');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
}

/**
 * Single string value of a query parameter
 *
 * Repeated or nested parameters (`?state=a&state=b`, `?state[x]=1`) are
 * treated as absent.
 */
export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}
