/**
 * Error handling utilities for route handlers
 */

import type { Request, Response, NextFunction } from 'express';

/**
 * Wraps an async route handler so rejections reach the Express error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   res.json(await service.getData(req.params.id));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
