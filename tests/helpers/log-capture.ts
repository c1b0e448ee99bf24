/**
 * Log Capture Helper
 *
 * Utility for capturing and analyzing Pino log entries during tests.
 * Provides methods to filter, query, and assert on structured log output.
 *
 * @module tests/helpers/log-capture
 */

import { Writable } from "node:stream";
import type { LogLevel } from "../../src/logging/types.js";

/**
 * Captured log entry structure (Pino format)
 */
export interface CapturedLogEntry {
  level: string | number;
  time?: string | number;
  component?: string;
  requestId?: string;
  msg: string;
  [key: string]: unknown;
}

/**
 * Log capture stream and utilities
 */
export class LogCapture {
  private logs: CapturedLogEntry[] = [];
  public readonly stream: Writable;

  constructor() {
    // Create a writable stream that captures log lines
    this.stream = new Writable({
      write: (
        chunk: Buffer | string,
        _encoding: BufferEncoding,
        callback: (error?: Error | null) => void
      ) => {
        for (const line of (typeof chunk === "string" ? chunk : chunk.toString()).split("\n")) {
          if (line.trim()) {
            this.logs.push(JSON.parse(line) as CapturedLogEntry);
          }
        }
        callback(null);
      },
    });
  }

  /**
   * Get all captured log entries
   */
  getAll(): CapturedLogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs filtered by component
   */
  getByComponent(component: string): CapturedLogEntry[] {
    return this.logs.filter((log) => log.component === component);
  }

  /**
   * Get logs filtered by level
   */
  getByLevel(level: Exclude<LogLevel, "silent">): CapturedLogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  /**
   * Find first log matching a predicate
   */
  find(predicate: (log: CapturedLogEntry) => boolean): CapturedLogEntry | undefined {
    return this.logs.find(predicate);
  }

  /**
   * Raw captured output, for leak checks
   */
  text(): string {
    return this.logs.map((log) => JSON.stringify(log)).join("\n");
  }

  /**
   * Clear all captured logs
   */
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
 * resetLogger();
 * initializeLogger({ level: "debug", format: "json", stream: capture.stream });
 *
 * // Run code that logs
 *
 * expect(capture.getByLevel("error")).toHaveLength(1);
 * ```
 */
export function createLogCapture(): LogCapture {
  return new LogCapture();
}
