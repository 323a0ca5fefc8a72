import type { Logger, LogEntry, LogFormat, LogLevel } from './types';

// Simple color map for development console output
const COLORS = {
  debug: '\x1b[34m', // Blue
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_VALUES, value);
}

function serializeError(error: unknown): { message: string; name?: string; stack?: string } {
  return error instanceof Error
    ? { message: error.message, name: error.name, stack: error.stack }
    : { message: String(error) };
}

export class RelayLogger implements Logger {
  private context: Record<string, unknown>;
  private level: LogLevel;
  private format: LogFormat;

  constructor(options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
    this.context = {
      component: options.component || 'App',
      ...context
    };
    this.level = options.level || 'info';
    this.format = options.format || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_VALUES[level] >= LEVEL_VALUES[this.level];
  }

  private output(level: LogLevel, msg: string, meta: object = {}, error?: unknown) {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      ...this.context,
      ...meta,
      ts: Date.now(),
      level,
      msg,
      component: String(this.context.component),
    };

    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }
  }

  private prettyPrint(entry: LogEntry) {
    const { ts, level, msg, component, error, ...rest } = entry;

    const isoString = new Date(ts).toISOString();
    const timePart = isoString.split('T')[1];
    const time = timePart ? timePart.slice(0, -1) : isoString;

    const levelColor = COLORS[level];
    const reset = COLORS.reset;
    const dim = COLORS.dim;

    console.log(
      `${dim}${time}${reset} ${levelColor}${level.toUpperCase().padEnd(5)}${reset} [${component}] ${msg}`
    );

    if (Object.keys(rest).length > 0) {
      console.log(`${dim}${JSON.stringify(rest)}${reset}`);
    }

    if (error !== undefined) {
      console.log(error);
    }
  }

  debug(msg: string, meta?: object) {
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: object) {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: object) {
    this.output('warn', msg, meta);
  }

  error(msg: string, error?: unknown, meta?: object) {
    this.output('error', msg, meta, error);
  }

  child(meta: object): Logger {
    return new RelayLogger(
      { level: this.level, format: this.format },
      { ...this.context, ...meta }
    );
  }
}

const envLevel = process.env.LOG_LEVEL;

// Global default logger
export const rootLogger = new RelayLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  component: 'Root'
});
