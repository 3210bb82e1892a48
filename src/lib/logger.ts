import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Root JSON logger. Request handlers log through `req.log`, a child of
 * this logger bound to the request id.
 */
export function createLogger(level = "info"): Logger {
  return pino({
    name: "menu-api",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}
