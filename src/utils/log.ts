import { colorize, type TerminalColor } from "./colors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Emit debug lines; otherwise they are dropped. */
  verbose?: boolean;
}

export const LOG_PREFIX = "[nmproxy]" as const;

const LEVEL_COLORS: Record<LogLevel, TerminalColor> = {
  debug: "gray",
  info: "cyan",
  warn: "yellow",
  error: "red",
};

export function formatLogLine(level: LogLevel, message: string): string {
  return `${LOG_PREFIX} ${colorize(level, LEVEL_COLORS[level])} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    debug: (message) => {
      if (verbose) {
        console.log(formatLogLine("debug", message));
      }
    },
    info: (message) => {
      console.log(formatLogLine("info", message));
    },
    warn: (message) => {
      console.warn(formatLogLine("warn", message));
    },
    error: (message) => {
      console.error(formatLogLine("error", message));
    },
  };
}
