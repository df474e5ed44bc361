/* eslint-disable no-console */
export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LoggerMetadata = Record<string, unknown>;

export type LogMethod = (message: string, metadata?: LoggerMetadata) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
}

type LoggerOptions = {
  module: string;
  level?: LogLevel;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in LEVEL_ORDER;

const resolveLevel = (explicit?: LogLevel): LogLevel => {
  if (explicit) return explicit;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const createEmitter =
  ({ module }: LoggerOptions, threshold: LogLevel, level: LogLevel): LogMethod =>
  (message, metadata) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${module}] ${message}`;
    if (metadata && Object.keys(metadata).length > 0) {
      consoleWriters[level](line, metadata);
    } else {
      consoleWriters[level](line);
    }
  };

export const createLogger = (options: LoggerOptions): Logger => {
  const threshold = resolveLevel(options.level);
  return {
    debug: createEmitter(options, threshold, "debug"),
    info: createEmitter(options, threshold, "info"),
    warn: createEmitter(options, threshold, "warn"),
    error: createEmitter(options, threshold, "error"),
    fatal: createEmitter(options, threshold, "fatal"),
  };
};

/** A logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
};
