/**
 * Structured logging utility for the exponent-pair engine.
 *
 * Writes one JSON object per line to stderr.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-round and per-cache diagnostics, only written in debug mode
 * - `info`: normal operation
 * - `warn`: conditions that don't prevent operation but may need attention
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "Closure"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "closure_round_complete"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { round: 2, pairCount: 14 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;

  /**
   * Destination for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: ((line: string) => void) | undefined;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ProofSearch', debugMode: true });
 * logger.debug('hull_computed', { vertexCount: 7 });
 * logger.warn('method_not_supported', { method: 'none' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink =
      options.sink ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, falling back to a marker when its data cannot be
 * serialized (circular references, bigint values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Logger that discards everything. Default for engine functions called without
 * a logger.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: (): void => {
    // discard
  },
});
