/**
 * Logger Service - File-based logging for debugging
 *
 * Writes logs to <storage root>/debug.log. Entries are timestamped and tagged
 * with the component that wrote them. Logging never fails the caller.
 */

import { Context, Effect, Layer } from "effect";
import * as fs from "node:fs";
import * as path from "node:path";
import { StoragePaths } from "./storage-paths";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  data?: unknown;
}

export interface LoggerServiceImpl {
  readonly debug: (context: string, message: string, data?: unknown) => Effect.Effect<void>;
  readonly info: (context: string, message: string, data?: unknown) => Effect.Effect<void>;
  readonly warn: (context: string, message: string, data?: unknown) => Effect.Effect<void>;
  readonly error: (context: string, message: string, data?: unknown) => Effect.Effect<void>;
  readonly getLogPath: () => string;
  readonly clear: () => Effect.Effect<void>;
  readonly tail: (lines?: number) => Effect.Effect<string[]>;
}

// ============================================================================
// Service Tag
// ============================================================================

export class LoggerService extends Context.Tag("LoggerService")<LoggerService, LoggerServiceImpl>() {}

// ============================================================================
// Implementation
// ============================================================================

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB max log size

const rotateLogIfNeeded = (logFile: string): void => {
  try {
    if (fs.existsSync(logFile)) {
      const stats = fs.statSync(logFile);
      if (stats.size > MAX_LOG_SIZE) {
        const backupPath = `${logFile}.1`;
        if (fs.existsSync(backupPath)) {
          fs.unlinkSync(backupPath);
        }
        fs.renameSync(logFile, backupPath);
      }
    }
  } catch {
    // Ignore rotation errors
  }
};

const serializeData = (data: unknown): string => {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return JSON.stringify(String(data));
  }
};

export const formatEntry = (entry: LogEntry): string => {
  const levelPadded = entry.level.toUpperCase().padEnd(5);
  const dataStr = entry.data !== undefined ? ` | ${serializeData(entry.data)}` : "";
  return `[${entry.timestamp}] ${levelPadded} [${entry.context}] ${entry.message}${dataStr}\n`;
};

export const makeLoggerService = (logFile: string): LoggerServiceImpl => {
  const writeLog = (level: LogLevel, context: string, message: string, data?: unknown): void => {
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      rotateLogIfNeeded(logFile);

      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        context,
        message,
        data,
      };

      fs.appendFileSync(logFile, formatEntry(entry));
    } catch {
      // Silently fail - logging should never break the app
    }
  };

  return {
    debug: (context, message, data) => Effect.sync(() => writeLog("debug", context, message, data)),

    info: (context, message, data) => Effect.sync(() => writeLog("info", context, message, data)),

    warn: (context, message, data) => Effect.sync(() => writeLog("warn", context, message, data)),

    error: (context, message, data) => Effect.sync(() => writeLog("error", context, message, data)),

    getLogPath: () => logFile,

    clear: () =>
      Effect.sync(() => {
        try {
          fs.rmSync(logFile, { force: true });
        } catch {
          // Ignore
        }
      }),

    tail: (lines = 50) =>
      Effect.sync(() => {
        try {
          if (!fs.existsSync(logFile)) {
            return [];
          }
          const content = fs.readFileSync(logFile, "utf-8");
          const allLines = content.split("\n").filter((l) => l.trim());
          return allLines.slice(-lines);
        } catch {
          return [];
        }
      }),
  };
};

/**
 * In-memory logger; `entries` is the live list of everything logged
 */
export const makeMemoryLoggerService = (): LoggerServiceImpl & { readonly entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (context: string, message: string, data?: unknown) =>
    Effect.sync(() => {
      entries.push({ timestamp: new Date().toISOString(), level, context, message, data });
    });

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getLogPath: () => ":memory:",
    clear: () =>
      Effect.sync(() => {
        entries.length = 0;
      }),
    tail: (lines = 50) =>
      Effect.sync(() => entries.slice(-lines).map((entry) => formatEntry(entry).trimEnd())),
  };
};

// ============================================================================
// Layer
// ============================================================================

export const LoggerServiceLive = Layer.effect(
  LoggerService,
  Effect.map(StoragePaths, (paths) => makeLoggerService(paths.logFile))
);

export const LoggerServiceMemory = Layer.sync(LoggerService, makeMemoryLoggerService);
