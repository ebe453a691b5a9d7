/**
 * Structured Logger with Trace IDs and Multiple Sinks
 *
 * Single logging entry point for toolbridge. Output goes to stderr by
 * default so the CLI's answers on stdout stay clean.
 *
 * Sinks:
 * - console: human-readable lines (default)
 * - memory: ring buffer for tests and programmatic access
 * - file: JSON lines appended to a log file
 *
 * Usage:
 *   const log = createComponentLogger('ProcessToolClient');
 *   log.info('Server ready', { server: 'github', toolCount: 12 });
 *   log.withTrace(traceId).warn('Late response discarded');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

/**
 * Parse a level name from configuration, falling back when unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink, writes every level to stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    // eslint-disable-next-line no-console
    console.error(`${prefix}${traceStr} ${entry.message}${dataStr}`);
  }
}

/** Memory sink, a ring buffer */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; traceId?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.traceId) {
      entries = entries.filter((e) => e.traceId === filter.traceId);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink, appends JSON lines */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

/** Level and sinks shared by a root logger and every child derived from it */
interface LoggerCore {
  minLevel: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  private core: LoggerCore;
  private defaultContext: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}, core?: LoggerCore, defaultContext: Record<string, unknown> = {}) {
    this.core = core ?? {
      minLevel: config.level ?? 'info',
      sinks: config.sinks ?? [new ConsoleSink()],
    };
    this.defaultContext = defaultContext;
  }

  /** Child logger with a bound trace ID */
  withTrace(traceId: string): StructuredLogger {
    const child = new StructuredLogger({}, this.core, this.defaultContext);
    child.traceId = traceId;
    return child;
  }

  /** Child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({}, this.core, { ...this.defaultContext, ...context });
    child.traceId = this.traceId;
    return child;
  }

  /**
   * Replace level and sinks in place. Children created earlier share the
   * same core, so they see the change.
   */
  reconfigure(config: LoggerConfig): void {
    if (config.level) this.core.minLevel = config.level;
    if (config.sinks) this.core.sinks = [...config.sinks];
  }

  setLevel(level: LogLevel): void {
    this.core.minLevel = level;
  }

  get level(): LogLevel {
    return this.core.minLevel;
  }

  addSink(sink: LogSink): void {
    this.core.sinks.push(sink);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.core.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.core.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // Sink failures are reported on stderr, never thrown.
        // eslint-disable-next-line no-console
        console.error(`log sink failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

// ─── Root logger ─────────────────────────────────────────────────────

/**
 * Root logger. Defaults to the console sink at 'warn' so library use stays
 * quiet; the CLI reconfigures it from LOG_LEVEL at startup.
 */
export const logger = new StructuredLogger({ level: 'warn' });

/**
 * Reconfigure the root logger (and every component logger derived from it).
 *
 * Example:
 *   configureLogger({
 *     level: 'debug',
 *     sinks: [new ConsoleSink(), new FileSink('.toolbridge/logs/agent.log')],
 *   });
 */
export function configureLogger(config: LoggerConfig): void {
  logger.reconfigure(config);
}

/**
 * Logger for a specific component (adds component name to context).
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
