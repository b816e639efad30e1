import type { Principal } from "../interfaces/principal.interface";

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
    interface Response {
      reqStartTime?: number;
    }
  }
}

export {};
