import pino, { type Logger } from "pino";

// stdout carries the MCP stdio protocol, so logs go to stderr.
const logger = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
