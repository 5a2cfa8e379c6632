import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forwards a rejected route promise to the error middleware. */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    route(req, res).catch(next);
  };
}
