/**
 * Structured logging.
 * Writes JSON lines to stderr so stdout stays free for callers that pipe text.
 */

import pino, { type Logger } from "pino";

export const logger = pino(
  {
    name: "paper-identifiers",
    level: process.env.LOG_LEVEL || "info",
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/** Logger bound to one component, e.g. `childLogger("extract")`. */
export function childLogger(component: string): Logger {
  return logger.child({ component });
}
