import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 ignores the promise a handler returns; hand rejections to the
 * error middleware instead.
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    void route(req, res).catch(next);
  };
}
