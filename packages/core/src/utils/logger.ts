/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Structured JSON logger.
 *
 * Each entry is emitted as a single JSON line on the console so it can be
 * filtered by level or by context fields in any log collector.
 */

import type { LogLevel } from '@composer-index/shared';

export type { LogLevel };

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'info') {
    this.logLevel = logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    if (error) {
      entry.error = {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }

    return entry;
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const jsonString = JSON.stringify(this.createLogEntry(level, message, context, error));

    switch (level) {
      case 'debug':
      case 'info':
        console.log(jsonString);
        break;
      case 'warn':
        console.warn(jsonString);
        break;
      case 'error':
        console.error(jsonString);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.emit('error', message, context, error);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get the process-wide logger, creating it on first use
 */
export function getLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel);
  }
  if (logLevel) {
    loggerInstance.setLevel(logLevel);
  }
  return loggerInstance;
}

/**
 * Create a standalone logger (useful for testing)
 */
export function createLogger(logLevel: LogLevel = 'info'): Logger {
  return new Logger(logLevel);
}
