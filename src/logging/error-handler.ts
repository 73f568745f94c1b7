/**
 * Error Logging and Handling System
 * Centralized logging for the dashboard. While the dashboard owns the
 * terminal, output goes to a log file instead of stdout/stderr.
 */

import fs from 'fs';
import path from 'path';

export enum ErrorLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: Record<ErrorLevel, number> = {
  [ErrorLevel.DEBUG]: 10,
  [ErrorLevel.INFO]: 20,
  [ErrorLevel.WARN]: 30,
  [ErrorLevel.ERROR]: 40,
  [ErrorLevel.FATAL]: 50,
};

export interface ErrorLog {
  level: ErrorLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string, log: ErrorLog) => void;

export interface ErrorHandlerOptions {
  level?: ErrorLevel;
  sink?: LogSink;
  /** Entries kept in memory for getLogs() */
  retain?: number;
}

export const consoleSink: LogSink = line => {
  console.error(line);
};

export function fileSink(filePath: string): LogSink {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  return (line, log) => {
    const trailer = log.stack ? `\n${log.stack}` : '';
    fs.appendFileSync(filePath, `${line}${trailer}\n`, 'utf8');
  };
}

export function parseLevel(value: string): ErrorLevel {
  const upper = value.toUpperCase();
  const match = Object.values(ErrorLevel).find(level => level === upper);
  return match ?? ErrorLevel.INFO;
}

export class ErrorHandler {
  private logs: ErrorLog[] = [];
  private readonly level: ErrorLevel;
  private sink: LogSink;
  private readonly retain: number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.level = options.level ?? ErrorLevel.INFO;
    this.sink = options.sink ?? consoleSink;
    this.retain = options.retain ?? 500;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  log(level: ErrorLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const errorLog: ErrorLog = {
      level,
      message: error ? `${message}: ${error.message}` : message,
      timestamp: new Date(),
      stack: LEVEL_ORDER[level] >= LEVEL_ORDER[ErrorLevel.ERROR] ? error?.stack : undefined,
      context
    };
    this.logs.push(errorLog);
    if (this.logs.length > this.retain) {
      this.logs.splice(0, this.logs.length - this.retain);
    }
    this.outputLog(errorLog);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.INFO, message, undefined, context);
  }

  warn(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.WARN, message, error, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.ERROR, message, error, context);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.FATAL, message, error, context);
  }

  private outputLog(log: ErrorLog): void {
    const context = log.context && Object.keys(log.context).length > 0 ? ` ${JSON.stringify(log.context)}` : '';
    const logMessage = `[${log.timestamp.toISOString()}] ${log.level}: ${log.message}${context}`;
    try {
      this.sink(logMessage, log);
    } catch (sinkError) {
      this.sink = consoleSink;
      console.error(`Log sink failed, falling back to stderr: ${String(sinkError)}`);
      console.error(logMessage);
    }
  }

  getLogs(level?: ErrorLevel): ErrorLog[] {
    if (level) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }

  clearLogs(): void {
    this.logs = [];
  }
}
