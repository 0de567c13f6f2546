/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LoggingConfig } from "../types";

export type LogLevel = LoggingConfig["level"];

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = "info") {}

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
