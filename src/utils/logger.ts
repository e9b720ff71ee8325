/**
 * Logger Utility
 * Writes leveled messages to stderr so command output on stdout stays clean
 */

import type { LogLevel } from "../types";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(
    private level: LogLevel = "warn",
    private scope?: string,
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] ${this.scope}: ${message}` : `[${tag}] ${message}`;
  }

  /**
   * Logger with the same level and a scope prefix
   */
  child(scope: string): Logger {
    return new Logger(this.level, scope);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.error(this.format("DEBUG", message));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.error(this.format("INFO", message));
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(this.format("WARN", message));
    }
  }

  error(message: string, error?: Error): void {
    console.error(this.format("ERROR", message));
    if (error) {
      console.error(error);
    }
  }
}
