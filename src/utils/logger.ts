import pino from "pino";

// stdout carries command reports; structured logs go to stderr.
const BASE_LOGGER = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  pino.destination(2),
);

export function createLogger(module: string): pino.Logger {
  return BASE_LOGGER.child({ module });
}

export { BASE_LOGGER as logger };
