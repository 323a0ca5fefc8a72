export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  msg: string;
  component: string;
  // Additional structured data
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown, meta?: object): void;

  // Create a child logger with additional context (e.g. component name)
  child(meta: object): Logger;
}
