// src/middlewares/auth.middleware.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Authenticator } from "../interfaces/authenticator.interface";

/**
 * Gate a route behind one authentication scheme. Must run before multer so an
 * unauthenticated upload is rejected without reading the body.
 */
export function requireAuth(authenticator: Authenticator): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    authenticator
      .authenticate(req)
      .then((principal) => {
        req.principal = principal;
        next();
      })
      .catch(next);
  };
}
