import { pino, type Logger, type LevelWithSilent } from "pino";

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}
