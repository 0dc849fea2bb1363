import pino, { Logger } from "pino";

export interface LoggerOptions {
  level: string;
  file: string;
}

export function isLogLevel(value: string): boolean {
  return value === "silent" || value in pino.levels.values;
}

/**
 * Creates the application logger, writing to stdout and to the log file
 */
export function createLogger({ level, file }: LoggerOptions): Logger {
  if (level === "silent") {
    return pino({ level });
  }

  return pino(
    { level },
    pino.multistream([
      { level: "trace", stream: process.stdout },
      { level: "trace", stream: pino.destination({ dest: file, mkdir: true }) },
    ])
  );
}

const initialLevel = process.env.LOG_LEVEL?.trim() || "info";

// stdout only until the config is loaded
export let logger: Logger = pino({
  level: isLogLevel(initialLevel) ? initialLevel : "info",
});

/**
 * Replaces the shared logger with one following the loaded config
 */
export function configureLogger(options: LoggerOptions): Logger {
  logger = createLogger(options);
  return logger;
}
