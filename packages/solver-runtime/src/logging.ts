/**
 * @module @bbo-plugin/runtime/logging
 *
 * Structured runtime logger. Records go to stderr: stdout carries the
 * protocol and must contain nothing but protocol lines.
 */

import { stringifyJson } from '@bbo-plugin/protocol';

type Fields = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export type LogFormat = 'text' | 'json';

export interface RuntimeLogger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields | Error): void;
  /**
   * Logger that adds `fields` to every record
   */
  child(fields: Fields): RuntimeLogger;
}

export interface RuntimeLoggerOptions {
  /** Minimum level to emit (default: 'warn') */
  level?: LogThreshold;
  /** Record format (default: 'text') */
  format?: LogFormat;
  /** Line sink (default: process.stderr) */
  sink?: (line: string) => void;
  /** Clock for timestamps in JSON records */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function defaultSink(line: string): void {
  process.stderr.write(`${line}\n`);
}

function errorFields(error: Error): Fields {
  const fields: Fields = { error: error.message, errorName: error.name };
  if ('code' in error && typeof error.code === 'string') {
    fields.code = error.code;
  }
  if (error.stack) {
    fields.stack = error.stack;
  }
  return fields;
}

function safeStringify(value: unknown): string {
  try {
    return stringifyJson(value);
  } catch {
    return '"[unserializable]"';
  }
}

/**
 * Create a logger for one runtime component.
 *
 * @example
 * ```typescript
 * const logger = createRuntimeLogger('runner', { level: 'debug' });
 * logger.child({ solverId: 1 }).debug('Solver created');
 * // [debug] runtime:runner: Solver created {"solverId":1}
 * ```
 */
export function createRuntimeLogger(
  namespace: string,
  options: RuntimeLoggerOptions = {},
  extra: Fields = {}
): RuntimeLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const format = options.format ?? 'text';
  const sink = options.sink ?? defaultSink;
  const now = options.now ?? (() => new Date());
  const ns = `runtime:${namespace}`;

  function emit(level: LogLevel, message: string, fields?: Fields): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const merged: Fields = { ...extra, ...(fields ?? {}) };

    if (format === 'json') {
      sink(safeStringify({ time: now().toISOString(), level, ns, msg: message, ...merged }));
      return;
    }

    const suffix = Object.keys(merged).length > 0 ? ` ${safeStringify(merged)}` : '';
    sink(`[${level}] ${ns}: ${message}${suffix}`);
  }

  return {
    debug(message, fields) {
      emit('debug', message, fields);
    },
    info(message, fields) {
      emit('info', message, fields);
    },
    warn(message, fields) {
      emit('warn', message, fields);
    },
    error(message, fields) {
      emit('error', message, fields instanceof Error ? errorFields(fields) : fields);
    },
    child(fields) {
      return createRuntimeLogger(namespace, options, { ...extra, ...fields });
    },
  };
}

/**
 * Logger that drops everything
 */
export const noopLogger: RuntimeLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
