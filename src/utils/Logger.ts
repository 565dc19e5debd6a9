/**
 * Leveled console logging for the export pipeline.
 *
 * The exporter hands each stage a child logger, so a line reads like
 * `... DEBUG [MarkupExporter:Parser] Parsed markup`.
 */

import type { LogLevel } from '../types/index.js';

/**
 * One log line before formatting.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Logger accepted by the parser, renderer, encoder and exporter.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger for a pipeline stage, e.g. 'Parser', 'Renderer' or 'Encoder' */
  child(context: string): ILogger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Writes to the console method matching each level.
 * Structured data goes out as a second argument, unformatted.
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly levelPriority: number;

  constructor(level: LogLevel = 'warn', context?: string) {
    this.level = level;
    this.context = context;
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
  }

  /**
   * Stage contexts nest with ':', as in `MarkupExporter:Encoder`.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext);
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

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVEL_PRIORITY[level] >= this.levelPriority;
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = formatLogEntry({
      level,
      message,
      context: this.context,
      data,
      timestamp: new Date(),
    });
    const args: unknown[] = data ? [line, data] : [line];

    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  }
}

/**
 * `<ISO timestamp> <LEVEL padded to 5> [<context>] <message>`
 */
export function formatLogEntry(entry: LogEntry): string {
  const prefix = entry.context ? `[${entry.context}]` : '';
  return `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${prefix} ${entry.message}`;
}

/**
 * Builds the default logger a component falls back to, e.g.
 * `createLogger('warn', 'ImageEncoder')`. 'silent' writes nothing.
 */
export function createLogger(level: LogLevel = 'warn', context?: string): ILogger {
  return new Logger(level, context);
}
