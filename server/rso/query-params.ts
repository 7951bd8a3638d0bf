import type { Request } from 'express';

/**
 * Read a single-valued query parameter; repeated or nested values count as absent
 */
export function getQueryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
