/**
 * Console logger with levels.
 * Silent under NODE_ENV=test so test output stays readable.
 */

import type { NextFunction, Request, Response } from "express";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

// Environment is read on each call, so values loaded by dotenv after import still apply.
export class Logger {
  private level: LogLevel | undefined;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled("debug")) console.debug(`[DEBUG] ${message}`, context ?? "");
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled("info")) console.info(`[INFO] ${message}`, context ?? "");
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled("warn")) console.warn(`[WARN] ${message}`, context ?? "");
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.enabled("error")) console.error(`[ERROR] ${message}`, error ?? "", context ?? "");
  }

  private currentLevel(): LogLevel {
    if (this.level) return this.level;
    const fromEnv = process.env.LOG_LEVEL;
    return isLogLevel(fromEnv) ? fromEnv : "info";
  }

  private enabled(level: LogLevel): boolean {
    if (process.env.NODE_ENV === "test") return false;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.currentLevel()];
  }
}

export const logger = new Logger();

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const started = Date.now();
  res.on("finish", () => {
    logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
};
