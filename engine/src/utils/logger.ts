/**
 * tcsetup Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine module logs through here.
 *
 * Silent by default so CLI users only see the clean staged output.
 * With --debug (or TCSETUP_LOG_LEVEL) structured logs go to stderr.
 *
 * NOTE: pino.destination() instead of transports: transports spawn
 * worker_threads, which would outlive a CLI that exits right after a run.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
