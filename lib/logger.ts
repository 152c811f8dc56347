/**
 * Structured logger with optional file output and rotation
 *
 * - Writes to stdout/stderr
 * - When a log directory is configured (LOG_DIR), also appends to
 *   `wiki-content-YYYY-MM-DD.log` there and keeps the last 7 days
 * - Timestamps all entries
 */

import * as fs from "fs";
import * as path from "path";

const MAX_LOG_DAYS = 7;
const LOG_FILE_PREFIX = "wiki-content-";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  /** Directory for daily log files; stdout only when omitted */
  logDir?: string;
  /** Clock override, used by tests */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  success(tag: string, message: string, data?: unknown): void;
  fail(tag: string, message: string, data?: unknown): void;
  pending(tag: string, message: string, data?: unknown): void;
  action(tag: string, message: string, data?: unknown): void;
}

export function formatMessage(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  if (entry.data !== undefined) {
    return `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`;
  }
  return `${prefix} ${entry.message}`;
}

function logFileName(logDir: string, date: Date): string {
  const day = date.toISOString().split("T")[0]; // YYYY-MM-DD
  return path.join(logDir, `${LOG_FILE_PREFIX}${day}.log`);
}

export function cleanOldLogs(logDir: string, now: Date = new Date()): void {
  const maxAge = MAX_LOG_DAYS * 24 * 60 * 60 * 1000;

  for (const file of fs.readdirSync(logDir)) {
    if (!file.startsWith(LOG_FILE_PREFIX) || !file.endsWith(".log")) continue;

    const filePath = path.join(logDir, file);
    const stats = fs.statSync(filePath);

    if (now.getTime() - stats.mtimeMs > maxAge) {
      fs.unlinkSync(filePath);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  let logDir = options.logDir;

  if (logDir) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
      cleanOldLogs(logDir, now());
    } catch (error) {
      console.error(`[logger] Log directory ${logDir} unusable, logging to console only: ${String(error)}`);
      logDir = undefined;
    }
  }

  function writeLog(level: LogLevel, message: string, data?: unknown): void {
    const timestamp = now();
    const formatted = formatMessage({
      timestamp: timestamp.toISOString(),
      level,
      message,
      data,
    });

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }

    if (logDir) {
      try {
        fs.appendFileSync(logFileName(logDir, timestamp), formatted + "\n");
      } catch (error) {
        // A broken log file must not stop a retrieval run
        console.error(`[logger] Failed to write log file: ${String(error)}`);
      }
    }
  }

  return {
    debug: (message, data) => writeLog("debug", message, data),
    info: (message, data) => writeLog("info", message, data),
    warn: (message, data) => writeLog("warn", message, data),
    error: (message, data) => writeLog("error", message, data),

    success: (tag, message, data) => writeLog("info", `✅ [${tag}] ${message}`, data),
    fail: (tag, message, data) => writeLog("error", `❌ [${tag}] ${message}`, data),
    pending: (tag, message, data) => writeLog("info", `🔄 [${tag}] ${message}`, data),
    action: (tag, message, data) => writeLog("info", `🎯 [${tag}] ${message}`, data),
  };
}

export const logger = createLogger({ logDir: process.env.LOG_DIR || undefined });

export default logger;
