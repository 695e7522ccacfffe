/**
 * Logger Utility
 * Handles console output with different log levels, optionally mirrored to a
 * log file
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import chalk from "chalk";
import { errorMessage } from "./errors";
import type { LogLevel } from "../types/config";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type MessageLevel = Exclude<LogLevel, "silent">;

const LABELS: Record<MessageLevel, string> = {
  debug: chalk.dim("[DEBUG]"),
  info: chalk.cyan("[INFO]"),
  warn: chalk.yellow("[WARN]"),
  error: chalk.red("[ERROR]"),
};

export interface LoggerOptions {
  level?: LogLevel;
  file?: string | null;
  name?: string;
}

export class Logger {
  private readonly level: LogLevel;
  // Cleared after the first failed write; console output continues
  private file: string | null;
  private readonly name: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.file = options.file ?? null;
    this.name = options.name ?? "any2md";

    if (this.file) {
      mkdirSync(dirname(this.file), { recursive: true });
    }
  }

  /**
   * Logger that prints nothing (used by tests)
   */
  static silent(): Logger {
    return new Logger({ level: "silent" });
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message);
    if (error instanceof Error && error.cause !== undefined && this.enabled("debug")) {
      console.error(error.cause);
    }
  }

  enabled(level: MessageLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: MessageLevel, message: string): void {
    if (!this.enabled(level)) return;

    const line = `${LABELS[level]} ${message}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }

    if (this.file) {
      this.writeFile(level, message, this.file);
    }
  }

  private writeFile(level: MessageLevel, message: string, file: string): void {
    const timestamp = new Date().toISOString();
    try {
      appendFileSync(
        file,
        `${timestamp} - ${this.name} - ${level.toUpperCase()} - ${message}\n`,
        "utf-8",
      );
    } catch (error) {
      this.file = null;
      console.error(
        `${LABELS.warn} Log file '${file}' disabled: ${errorMessage(error)}`,
      );
    }
  }
}
