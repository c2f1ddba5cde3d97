/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

import { stringifyJson } from "./json";

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
} as const;

const COLORS = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
} as const;

const RESET = "\x1b[0m";

const LEVEL_NAMES: readonly string[] = Object.values(LogLevel);

const isLogLevel = (value: string): value is LogLevel => LEVEL_NAMES.includes(value);

const getCurrentLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel !== undefined && isLogLevel(envLevel)) return envLevel;
  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];

let sink: LogSink | null = null;

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

/**
 * logger.info("msg", { ...fields }): the fields object is flattened to strings,
 * bigints included.
 */
function toFields(fields: unknown): Record<string, string> | undefined {
  if (!isFieldsObject(fields)) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    out[k] = typeof v === "string" ? v : typeof v === "bigint" ? v.toString() : stringifyJson(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function formatLine(record: LogRecord, color: boolean): string {
  const header = `[${new Date(record.tsMs).toISOString()}] [${record.level}]${record.scope ? ` [${record.scope}]` : ""}`;
  const tail = record.fields
    ? ` ${Object.entries(record.fields)
        .map(([k, v]) => `${k}=${v}`)
        .join(" ")}`
    : "";
  const coloredHeader = color ? `${COLORS[record.level]}${header}${RESET}` : header;
  return `${coloredHeader} ${record.message}${tail}`;
}

function emit(level: LogLevel, scope: string | undefined, message: string, fields: unknown): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = { tsMs: Date.now(), level, scope, message, fields: toFields(fields) };

  if (sink) {
    sink.write(record);
    return;
  }

  const line = formatLine(record, process.stdout.isTTY === true);
  if (level === LogLevel.ERROR) console.error(line);
  else if (level === LogLevel.WARN) console.warn(line);
  else console.log(line);
}

export interface Logger {
  info(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Logger that tags every record with a scope, e.g. the pool id.
 */
export function createLogger(scope?: string): Logger {
  return {
    info: (message, fields) => emit(LogLevel.INFO, scope, message, fields),
    debug: (message, fields) => emit(LogLevel.DEBUG, scope, message, fields),
    warn: (message, fields) => emit(LogLevel.WARN, scope, message, fields),
    error: (message, fields) => emit(LogLevel.ERROR, scope, message, fields),
  };
}

export const logger = {
  ...createLogger(),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  clearSink: () => {
    sink = null;
  },
};
