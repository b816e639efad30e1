import type { Response } from "express";
import ipaddr from "ipaddr.js";
import type { Envelope } from "../interfaces/envelope.interface";
import { logger } from "../logger";

interface SuccessParams<T> {
  data: T;
  message?: string;
  code?: number;
}

interface ErrorParams {
  message: string;
  code?: number;
}

function clientIp(ip: string | undefined): string {
  if (!ip) return "";
  return ipaddr.isValid(ip) ? ipaddr.process(ip).toString() : ip;
}

export class Resp<T> {
  constructor(
    public readonly success: boolean,
    public readonly data: T | null,
    public readonly message: string,
    public readonly code: number
  ) {}

  static success<T>({ data, message = "Success", code = 200 }: SuccessParams<T>) {
    return new Resp<T>(true, data, message, code);
  }

  static error({ message, code = 500 }: ErrorParams) {
    return new Resp<null>(false, null, message, code);
  }

  public toJSON(): Envelope<T> {
    return { success: this.success, message: this.message, data: this.data };
  }

  public send(res: Response) {
    const started = res.reqStartTime ?? Date.now();
    const diff = Date.now() - started;

    logger.info(
      `${res.req.method} ${res.req.originalUrl} - ${this.code} ${diff} ms ${clientIp(res.req.ip)}`
    );
    res.header("X-Response-Time", `${diff} ms`);
    return res.status(this.code).json(this.toJSON());
  }
}
