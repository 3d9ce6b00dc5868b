/**
 * Structured solver logging.
 *
 * Emits one JSON line per event to stdout with:
 * - timestamp, level, scope, message, and event-specific fields
 *
 * Zero external dependencies. The sink is injectable so callers (and tests)
 * can route lines elsewhere.
 */

import { getConfig, type LogLevel } from '@rowspace/config';

export type LogFields = Record<string, string | number | boolean | null>;

export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Logger sharing level and sink, with a nested scope name. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope: string;
  /** Minimum level to emit (default: ROWSPACE_LOG_LEVEL) */
  level?: LogLevel;
  /** Line writer (default: process.stdout) */
  sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n');
};

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? getConfig().logLevel;
  const sink = options.sink ?? stdoutSink;
  const threshold = SEVERITY[level];

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < threshold) return;
    const entry = {
      ts: new Date().toISOString(),
      level: entryLevel,
      scope: options.scope,
      msg,
      ...fields,
    };
    sink(JSON.stringify(entry));
  };

  return {
    scope: options.scope,
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (scope) => createLogger({ scope: `${options.scope}.${scope}`, level, sink }),
  };
}

let root: Logger | undefined;

/** Process-wide default logger, created on first use. */
export function defaultLogger(): Logger {
  if (root === undefined) {
    root = createLogger({ scope: 'rowspace' });
  }
  return root;
}
