/**
 * Structured logging utility for the opencli command-line front end.
 *
 * Writes one JSON object per line to stderr. The loader and model never log;
 * only the CLI does.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
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
   * @example "cli"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "load_started"
   */
  readonly event: string;

  /** Additional structured data associated with the entry. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Destination for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly write?: (line: string) => void;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'cli', debugMode: true });
 * logger.debug('load_started', { path: 'opencli.yaml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Logs a debug-level message. A no-op unless debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an error-level message. Always written.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing data that cannot be represented as JSON
 * (circular structures, BigInt) with a marker.
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
