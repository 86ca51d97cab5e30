// log.ts
//
// Process-wide pino logger. JSON lines go to stderr so stdout stays free for
// the report itself.

import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino(
  {
    name: "provkit",
    level: process.env["PROVKIT_LOG_LEVEL"] || "info",
  },
  pino.destination(2)
);
