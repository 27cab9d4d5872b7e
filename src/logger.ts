import pino from "pino";

export type Logger = pino.Logger;

/** Logger used when the caller supplies none: records nothing. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function childLogger(logger: Logger, name: string): Logger {
  return logger.child({ name });
}
