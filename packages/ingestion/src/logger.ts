import type { LogLevel } from "./types";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
}

export interface LoggerSink {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function formatLogLine(message: string, fields?: LogFields): string {
  if (!fields) {
    return message;
  }

  const parts: string[] = [];

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }

    parts.push(`${key}=${value === null ? "null" : String(value)}`);
  }

  if (parts.length === 0) {
    return message;
  }

  return `${message} (${parts.join(", ")})`;
}

export function createLogger(
  level: LogLevel = "info",
  sink: LoggerSink = console
): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (
    messageLevel: LogLevel,
    write: (line: string) => void,
    message: string,
    fields?: LogFields
  ): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) {
      return;
    }

    write(formatLogLine(message, fields));
  };

  return {
    debug: (message, fields) => emit("debug", sink.log, message, fields),
    info: (message, fields) => emit("info", sink.log, message, fields),
    warn: (message, fields) => emit("warn", sink.warn, message, fields),
    error: (message, fields) => emit("error", sink.error, message, fields)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
