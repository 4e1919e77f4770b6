/**
 * Logging for the SpireSmiths engine.
 *
 * Engine objects take an injectable Logger so tests can stay quiet and a
 * CLI can turn the volume up. The console logger prefixes every line with
 * its tag, e.g. `[Match] player1 played fire_elemental`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
] as const;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** A logger with the same level and sink but a different tag. */
  child(tag: string): Logger;
}

/** Where log lines go. `console` satisfies this. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  /** Prefix shown in brackets (defaults to 'SpireSmiths'). */
  tag?: string;
  /** Lowest level that is written (defaults to 'warn'). */
  level?: LogLevel;
  /** Output target (defaults to the global console). */
  sink?: LogSink;
}

/** Level used by engine objects when no logger is injected. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** Create a console-backed logger that drops lines below `level`. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    tag = 'SpireSmiths',
    level = DEFAULT_LOG_LEVEL,
    sink = console,
  } = options;
  const threshold = rank(level);

  const write =
    (lineLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...details: unknown[]): void => {
      if (rank(lineLevel) < threshold) return;
      sink[lineLevel](`[${tag}] ${message}`, ...details);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (childTag: string) => createLogger({ tag: childTag, level, sink }),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read a level from a string such as `process.env.LOG_LEVEL`.
 * Unknown or missing values fall back.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = DEFAULT_LOG_LEVEL,
): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
