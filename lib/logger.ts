/**
 * @fileoverview Centralized Logging Utility
 *
 * Provides consistent logging throughout the roster console with:
 * - A minimum level taken from configuration (NEXT_PUBLIC_LOG_LEVEL)
 * - Scoped child loggers (`[INFO] [roster-store] ...`)
 * - A bounded in-memory history shared by all scoped loggers
 *
 * @module lib/logger
 */

import { getRosterConfig, type LogLevel } from './roster-config';

export interface LogEntry {
  level: LogLevel;
  scope: string | null;
  message: string;
  data?: unknown;
  timestamp: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export const MAX_LOG_HISTORY = 100;

class Logger {
  private history: LogEntry[];
  private minLevel: LogLevel;

  constructor(
    private readonly scope: string | null = null,
    minLevel?: LogLevel,
    sharedHistory?: LogEntry[],
  ) {
    this.minLevel = minLevel ?? getRosterConfig().logLevel;
    this.history = sharedHistory ?? [];
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      scope: this.scope,
      message,
      data,
      timestamp: new Date().toISOString(),
    };

    // History keeps everything, including levels below the threshold
    this.history.push(entry);
    if (this.history.length > MAX_LOG_HISTORY) {
      this.history.shift();
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const prefix = this.scope ? `[${level.toUpperCase()}] [${this.scope}]` : `[${level.toUpperCase()}]`;
    const logMessage = `${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(logMessage, data ?? '');
        break;
      case 'info':
        console.info(logMessage, data ?? '');
        break;
      case 'warn':
        console.warn(logMessage, data ?? '');
        break;
      case 'error':
        console.error(logMessage, data ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    const errorData = error instanceof Error
      ? { name: error.name, message: error.message, stack: error.stack }
      : error;
    this.log('error', message, errorData);
  }

  /**
   * Child logger sharing this logger's level and history.
   */
  child(scope: string): Logger {
    return new Logger(scope, this.minLevel, this.history);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Get recent log history, optionally for one level
   */
  getHistory(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.history.filter(entry => entry.level === level);
    }
    return [...this.history];
  }

  /**
   * Clear log history (in place, so children see it too)
   */
  clearHistory(): void {
    this.history.length = 0;
  }
}

export type { Logger };

// Export singleton instance
export const logger = new Logger();

export const createLogger = (scope: string): Logger => logger.child(scope);
