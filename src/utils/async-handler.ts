import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Express 4 does not forward rejected promises; route them to `next`.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
