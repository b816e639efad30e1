import type { Request } from "express";
import type { Principal } from "./principal.interface";

export type AuthRequest = Pick<Request, "headers">;

/**
 * A credential check for one authentication scheme.
 * Resolves with the caller's principal or rejects with `UnauthorizedError`.
 */
export interface Authenticator {
  readonly scheme: Principal["scheme"];
  authenticate(req: AuthRequest): Promise<Principal>;
}
