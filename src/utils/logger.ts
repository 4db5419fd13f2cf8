/**
 * Logging utilities for escrow and factory operations
 */

import { appendFile } from "node:fs/promises";

// Log levels
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

// ANSI color codes
const COLORS = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  reset: "\x1b[0m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.INFO]: COLORS.green,
  [LogLevel.DEBUG]: COLORS.blue,
  [LogLevel.TRACE]: COLORS.gray,
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.WARN]: "WARN",
  [LogLevel.INFO]: "INFO",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.TRACE]: "TRACE",
};

/**
 * Parse a level name, falling back to INFO
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.toUpperCase()) {
    case "ERROR": return LogLevel.ERROR;
    case "WARN": return LogLevel.WARN;
    case "INFO": return LogLevel.INFO;
    case "DEBUG": return LogLevel.DEBUG;
    case "TRACE": return LogLevel.TRACE;
    default: return LogLevel.INFO;
  }
}

// bigint is not JSON-serializable
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Logger with context, level filtering and an optional file sink
 */
export class Logger {
  private context: string;
  private minLevel: LogLevel;
  private logFile?: string;

  constructor(context: string, options: { level?: LogLevel; logFile?: string } = {}) {
    this.context = context;
    this.minLevel = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.logFile = options.logFile ?? process.env.LOG_FILE;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  /**
   * Format log message
   */
  private formatMessage(
    level: LogLevel,
    message: string,
    data?: unknown
  ): { console: string; file: string } {
    const timestamp = new Date().toISOString();
    const levelName = LEVEL_NAMES[level];
    const levelColor = LEVEL_COLORS[level];

    let consoleMsg = `${COLORS.gray}[${timestamp}]${COLORS.reset} `;
    consoleMsg += `${levelColor}[${levelName}]${COLORS.reset} `;
    consoleMsg += `${COLORS.cyan}[${this.context}]${COLORS.reset} `;
    consoleMsg += message;

    let fileMsg = `[${timestamp}] [${levelName}] [${this.context}] ${message}`;

    if (data !== undefined) {
      const dataStr = data instanceof Error
        ? data.stack ?? data.message
        : typeof data === "object"
          ? JSON.stringify(data, jsonReplacer, 2)
          : String(data);

      consoleMsg += `\n${COLORS.gray}${dataStr}${COLORS.reset}`;
      fileMsg += `\n${dataStr}`;
    }

    return { console: consoleMsg, file: fileMsg };
  }

  private async writeToFile(message: string): Promise<void> {
    if (!this.logFile) return;

    try {
      await appendFile(this.logFile, message + "\n", "utf8");
    } catch (error) {
      console.error("Failed to write to log file:", error);
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level > this.minLevel) return;

    const formatted = this.formatMessage(level, message, data);

    if (level === LogLevel.ERROR) {
      console.error(formatted.console);
    } else if (level === LogLevel.WARN) {
      console.warn(formatted.console);
    } else {
      console.log(formatted.console);
    }

    if (this.logFile) {
      void this.writeToFile(formatted.file);
    }
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  trace(message: string, data?: unknown): void {
    this.log(LogLevel.TRACE, message, data);
  }

  /**
   * Log an escrow lifecycle event
   */
  logEscrowEvent(
    escrow: string,
    event: string,
    details?: Record<string, unknown>
  ): void {
    const level = event.includes("Failed") || event.includes("Rejected")
      ? LogLevel.WARN
      : LogLevel.INFO;

    this.log(level, `Escrow ${escrow} - ${event}`, details);
  }

  /**
   * Create child logger with additional context
   */
  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, {
      level: this.minLevel,
      logFile: this.logFile,
    });
  }
}

// Global logger instances
export const rootLogger = new Logger("Escrow-Engine");
export const escrowLogger = rootLogger.child("Escrow");
export const factoryLogger = rootLogger.child("Factory");
export const relayLogger = rootLogger.child("Relay");
export const apiLogger = rootLogger.child("Api");
