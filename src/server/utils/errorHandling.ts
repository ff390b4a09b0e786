import { Request, Response, NextFunction } from 'express';

/**
 * Wrap an async route handler so rejections reach the error middleware.
 *
 * Usage:
 * ```typescript
 * router.get('/:jobId', asyncHandler(async (req, res) => {
 *   res.json(await jobManager.getStatus(req.params.jobId));
 * }));
 * ```
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
