import type { Request, Response, NextFunction } from "express";
import { isBodyParserError, isStorageError } from "../lib/errors";
import { apiErr } from "./respond";

export function errorHandler() {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);

    if (isBodyParserError(err) && err.status < 500) {
      const r =
        err.type === "entity.too.large"
          ? apiErr(req, "PAYLOAD_TOO_LARGE", "Request body is too large.", 413)
          : apiErr(req, "INVALID_JSON", "Request body is not valid JSON.", 400);
      req.log.warn({ type: err.type }, "rejected request body");
      return res.status(r.status).json(r.body);
    }

    if (isStorageError(err)) {
      req.log.error({ err, operation: err.operation }, "storage failure");
    } else {
      req.log.error({ err }, "unhandled error");
    }

    // Internal detail stays in the log
    const r = apiErr(req, "INTERNAL_ERROR", "An unexpected error occurred.", 500);
    return res.status(r.status).json(r.body);
  };
}

export function routeNotFound() {
  return (req: Request, res: Response) => {
    const r = apiErr(req, "ROUTE_NOT_FOUND", `No route for ${req.method} ${req.path}.`, 404);
    res.status(r.status).json(r.body);
  };
}
