/**
 * Component loggers for techmap.
 *
 * Output goes to the console method matching the level. The threshold is
 * shared by every logger: it starts from LOG_LEVEL and `--verbose` lowers it
 * to debug.
 */

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ANSI_RESET = '\x1b[0m';

const TAG_STYLE: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

type ConsoleSink = (...args: unknown[]) => void;

const SINKS: Record<LogLevel, ConsoleSink> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

const fromEnv = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(fromEnv) ? fromEnv : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** `HH:MM:SS.mmm LEVEL [component] message`, with the level tag colored. */
export function formatMessage(level: LogLevel, component: string, message: string): string {
  const clock = new Date().toISOString().slice(11, 23);
  const tag = `${TAG_STYLE[level]}${level.toUpperCase().padEnd(5)}${ANSI_RESET}`;
  return `${clock} ${tag} [${component}] ${message}`;
}

export type LogFn = (message: string, data?: unknown) => void;

export type Logger = Record<LogLevel, LogFn>;

export function createLogger(component: string): Logger {
  const at = (level: LogLevel): LogFn => (message, data) => {
    if (rank(level) < rank(threshold)) return;
    const line = formatMessage(level, component, message);
    if (data === undefined) {
      SINKS[level](line);
    } else {
      SINKS[level](line, data);
    }
  };

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}
