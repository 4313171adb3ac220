/**
 * Structured JSON logging.
 *
 * Each call writes one JSON object per line with `level`, `message`, `timestamp` and the
 * logger's bound context, so CloudWatch / Loki style collectors can index the fields.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
  /** Returns a logger that adds `context` to every entry. */
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Output target (default: console.log) */
  sink?: LogSink;
  /** Clock used for timestamps */
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Creates a structured logger bound to `context`.
 *
 * @example
 * ```typescript
 * const log = createLogger({ service: 'voxqueue-api' }, { level: 'debug' });
 * log.child({ jobId }).info('Job completed', { bytes: 2048 });
 * // {"level":"info","message":"Job completed","timestamp":"…","service":"voxqueue-api","jobId":"…","bytes":2048}
 * ```
 */
export function createLogger(context: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink: LogSink = options.sink ?? (line => console.log(line));
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, message: string, extra?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < threshold) return;
    const entry = { level, message, timestamp: now().toISOString(), ...context, ...extra };
    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular or BigInt payloads: keep the event, drop the fields.
      line = JSON.stringify({
        level,
        message,
        timestamp: entry.timestamp,
        serialization_error: error instanceof Error ? error.message : String(error)
      });
    }
    sink(line, level);
  };

  return {
    debug: (message, extra) => write('debug', message, extra),
    info: (message, extra) => write('info', message, extra),
    warn: (message, extra) => write('warn', message, extra),
    error: (message, extra) => write('error', message, extra),
    child: extraContext => createLogger({ ...context, ...extraContext }, options)
  };
}

/** Flattens an unknown thrown value into log fields. */
export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack ? { error: error.message, stack: error.stack } : { error: error.message };
  }
  return { error: String(error) };
}

/** A logger that discards everything; handy as a default in tests. */
export const silentLogger: Logger = createLogger({}, { sink: () => undefined });
