import type { Request, Response, NextFunction } from "express";
import crypto from "node:crypto";
import type { Logger } from "../lib/logger";

declare global {
  namespace Express {
    interface Request {
      requestId: string;
      log: Logger;
    }
  }
}

const HEADER = "x-request-id";
const MAX_INBOUND_LENGTH = 128;

/**
 * Reuses a caller-supplied x-request-id when it looks sane, otherwise mints
 * one; echoes it back and binds a child logger to it as `req.log`.
 */
export function requestId(logger: Logger) {
  return function (req: Request, res: Response, next: NextFunction) {
    const inbound = String(req.header(HEADER) ?? "").trim();
    const id =
      inbound && inbound.length <= MAX_INBOUND_LENGTH ? inbound : crypto.randomUUID();

    req.requestId = id;
    req.log = logger.child({ requestId: id });
    res.setHeader(HEADER, id);
    next();
  };
}
