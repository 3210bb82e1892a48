import type { Request, Response, NextFunction } from "express";

// One line per response, level chosen by status class.
export function httpLogging() {
  return function (req: Request, res: Response, next: NextFunction) {
    const startedAt = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";

      req.log[level](
        {
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs: Math.round(durationMs * 10) / 10,
        },
        "HTTP response"
      );
    });

    next();
  };
}
