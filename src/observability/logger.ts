/**
 * @fileoverview Structured Logger - leveled, JSON-serializable logging.
 *
 * Every entry carries the emitting module and, inside a run, the run ID, so
 * the output of concurrent runs can be told apart. Output goes through
 * pluggable transports; tests use {@link MemoryTransport}.
 *
 * @module research-loop/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run the entry belongs to, if any */
  readonly runId: UniqueId | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly code: string | undefined;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  readonly transports: ReadonlyArray<LogTransport>;

  readonly runId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'research-loop',
  transports: [],
};

/**
 * Console transport - outputs to console with formatting.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;
  private readonly stderrOnly: boolean;

  /**
   * @param stderrOnly - write every level to stderr, keeping stdout for
   * command output
   */
  constructor(useColors: boolean = process.stderr.isTTY === true, stderrOnly: boolean = false) {
    this.useColors = useColors;
    this.stderrOnly = stderrOnly;
  }

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}`;
    const data = Object.keys(entry.data).length > 0 ? entry.data : '';

    if (this.stderrOnly) {
      console.error(line, data, entry.error ?? '');
      return;
    }

    switch (entry.level) {
      case Severity.DEBUG:
        console.debug(line, data);
        break;
      case Severity.INFO:
        console.info(line, data);
        break;
      case Severity.WARN:
        console.warn(line, data);
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(line, data, entry.error ?? '');
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const scope = entry.runId !== null ? `${entry.module}:${entry.runId.slice(0, 8)}` : entry.module;

    if (this.useColors) {
      const color = LEVEL_COLORS[entry.level];
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${scope}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${scope}]`;
  }
}

const LEVEL_COLORS: Record<Severity, string> = {
  DEBUG: '\x1b[90m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
};

/**
 * Memory transport - stores logs in memory for testing/debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByRunId(runId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.runId === runId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('agent.loop', { minLevel: Severity.DEBUG });
 * const runLogger = logger.child({ runId });
 * runLogger.info('Step recorded', { sequence: 1, outcome: 'success' });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
  }

  get minLevel(): Severity {
    return this.config.minLevel;
  }

  /**
   * Creates a child logger sharing this logger's transports.
   */
  child(context: { module?: string; runId?: UniqueId }): Logger {
    return new Logger({
      ...this.config,
      module: context.module ?? this.config.module,
      runId: context.runId ?? this.config.runId,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (SEVERITY_ORDER[level] < SEVERITY_ORDER[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      runId: this.config.runId ?? null,
      data: data ?? {},
      error: error ? formatError(error) : null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: Error): LogError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    code,
  };
}

/**
 * Parses a severity name (case-insensitive). Returns null when unknown.
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  for (const level of Object.values(Severity)) {
    if (level === upper) return level;
  }
  return null;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
