import { Request, Response, NextFunction } from 'express';

/**
 * Wrap an async route handler so rejections reach the error handler.
 *
 * Usage:
 * ```typescript
 * router.post('/extract', asyncHandler(async (req, res) => {
 *   res.json(await service.run(req.body));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
