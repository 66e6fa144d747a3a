export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, extra?: LogContext): void;
  info(msg: string, extra?: LogContext): void;
  warn(msg: string, extra?: LogContext): void;
  error(msg: string, extra?: LogContext): void;
}

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
type Level = (typeof LEVELS)[number];

function currentLevel(): Level {
  const raw = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return LEVELS.find((level) => level === raw) ?? 'info';
}

function enabled(level: Level): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(currentLevel());
}

function format(extra?: LogContext): string {
  return extra ? JSON.stringify(extra) : '';
}

/** Console logger with a `[scope]` prefix, e.g. `[dispatch] upstream call failed {...}`. */
export function createLogger(scope: string): Logger {
  return {
    debug: (msg, extra) => {
      if (enabled('debug')) console.debug(`[${scope}] ${msg}`, format(extra));
    },
    info: (msg, extra) => {
      if (enabled('info')) console.log(`[${scope}] ${msg}`, format(extra));
    },
    warn: (msg, extra) => {
      if (enabled('warn')) console.warn(`[${scope}] ${msg}`, format(extra));
    },
    error: (msg, extra) => {
      if (enabled('error')) console.error(`[${scope}] ${msg}`, format(extra));
    },
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.cause === undefined ? err.message : `${err.message} (cause: ${describeError(err.cause)})`;
  }
  return String(err);
}
