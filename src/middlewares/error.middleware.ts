// src/middlewares/error.middleware.ts
import type { Request, Response, NextFunction } from "express";
import { MulterError } from "multer";
import { AppError, ValidationError } from "../errors/app-error";
import { Resp } from "../utils/response.util";
import { logger } from "../logger";

const MULTER_MESSAGES: Partial<Record<MulterError["code"], string>> = {
  LIMIT_FILE_SIZE: "File too large",
  LIMIT_FILE_COUNT: "Only one file may be uploaded",
  LIMIT_UNEXPECTED_FILE: "Unexpected file field",
};

function hasStatus(err: unknown): err is { status: number; type?: string } {
  return typeof err === "object" && err !== null && typeof Reflect.get(err, "status") === "number";
}

function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;
  if (err instanceof MulterError) {
    return new ValidationError(MULTER_MESSAGES[err.code] ?? err.message);
  }
  // body-parser: malformed JSON and friends
  if (hasStatus(err) && err.status === 400) {
    return new ValidationError("Malformed request body");
  }
  return null;
}

export function notFoundHandler(req: Request, res: Response) {
  return Resp.error({ message: "Route not found", code: 404 }).send(res);
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const appError = toAppError(err);

  if (!appError) {
    logger.error(err instanceof Error ? err : String(err));
    return Resp.error({ message: "Internal server error", code: 500 }).send(res);
  }

  if (appError.status >= 500) {
    logger.error(`${appError.kind}: ${appError.message}`, { cause: String(appError.cause) });
  }
  return Resp.error({ message: appError.message, code: appError.status }).send(res);
}
