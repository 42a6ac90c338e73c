import type { Request, Response, NextFunction } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Forward async rejections to the central error handler */
export function asyncHandler(fn: AsyncRoute) {
  return function wrapped(req: Request, res: Response, next: NextFunction) {
    fn(req, res, next).catch(next);
  };
}
