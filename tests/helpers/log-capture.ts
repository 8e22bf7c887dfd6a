/**
 * Log Capture Helper
 *
 * Utility for capturing and analyzing Pino log entries during tests.
 *
 * @module tests/helpers/log-capture
 */

import { Writable } from "node:stream";
import type { LogLevel } from "../../src/logging/types.js";

/**
 * Captured log entry structure (Pino format)
 */
export interface LogEntry {
  level: string | number;
  time?: string | number;
  component?: string;
  environment?: string;
  msg: string;
  [key: string]: unknown;
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "msg" in value &&
    typeof value.msg === "string" &&
    "level" in value &&
    (typeof value.level === "string" || typeof value.level === "number")
  );
}

/**
 * Log capture stream and utilities
 */
export class LogCapture {
  private logs: LogEntry[] = [];
  public readonly stream: Writable;

  constructor() {
    this.stream = new Writable({
      write: (
        chunk: Buffer | string,
        _encoding: BufferEncoding,
        callback: (error?: Error | null) => void
      ) => {
        const line = (typeof chunk === "string" ? chunk : chunk.toString()).trim();
        if (line) {
          const parsed: unknown = JSON.parse(line);
          if (isLogEntry(parsed)) {
            this.logs.push(parsed);
          }
        }
        callback(null);
      },
    });
  }

  getAll(): LogEntry[] {
    return [...this.logs];
  }

  getByComponent(component: string): LogEntry[] {
    return this.logs.filter((log) => log.component === component);
  }

  getByLevel(level: Exclude<LogLevel, "silent">): LogEntry[] {
    return this.logs.filter((log) => {
      if (typeof log.level === "string") {
        return log.level === level;
      }
      // Pino numeric levels
      const levelMap: Record<Exclude<LogLevel, "silent">, number> = {
        trace: 10,
        debug: 20,
        info: 30,
        warn: 40,
        error: 50,
        fatal: 60,
      };
      return log.level === levelMap[level];
    });
  }

  find(predicate: (log: LogEntry) => boolean): LogEntry | undefined {
    return this.logs.find(predicate);
  }

  clear(): void {
    this.logs = [];
  }
}

/**
 * Create a log capture instance for testing
 *
 * @example
 * ```typescript
 * const capture = createLogCapture();
 * initializeLogger({ level: "debug", format: "json", stream: capture.stream });
 *
 * await runner.upgrade();
 *
 * expect(capture.getByComponent("migration:runner")).not.toHaveLength(0);
 * ```
 */
export function createLogCapture(): LogCapture {
  return new LogCapture();
}
