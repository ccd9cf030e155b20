/**
 * Leveled logger with pluggable sinks.
 *
 * A Logger is created once at startup and handed to the code that needs
 * it. Each record is rendered as
 * `YYYY-MM-DD HH:mm:ss,SSS - <name> - <LEVEL> - <message>`.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/** Numeric severity per level; records below the threshold are dropped */
export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARNING", "ERROR"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogRecord {
  timestamp: Date;
  name: string;
  level: LogLevel;
  message: string;
}

/**
 * Destination for rendered log lines.
 */
export interface LogSink {
  write(line: string, record: LogRecord): void;
}

/**
 * Appends each line to a file. The parent directory is created when the
 * sink is constructed, so an unusable path fails before anything is logged.
 */
export class FileSink implements LogSink {
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  write(line: string): void {
    appendFileSync(this.path, line + "\n", "utf8");
  }
}

/**
 * Writes errors to stderr and everything else to stdout.
 */
export class ConsoleSink implements LogSink {
  write(line: string, record: LogRecord): void {
    if (LOG_LEVEL_SEVERITY[record.level] >= LOG_LEVEL_SEVERITY.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Render a local timestamp as `YYYY-MM-DD HH:mm:ss,SSS`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatLogRecord(record: LogRecord): string {
  return `${formatTimestamp(record.timestamp)} - ${record.name} - ${record.level} - ${record.message}`;
}

export interface LoggerOptions {
  /** Minimum level written to the sinks (default INFO) */
  level?: LogLevel;
  sinks?: LogSink[];
  /** Source of record timestamps (default: current time) */
  clock?: () => Date;
}

export class Logger {
  private readonly name: string;
  private readonly level: LogLevel;
  private readonly sinks: LogSink[];
  private readonly clock: () => Date;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.level = options.level ?? "INFO";
    this.sinks = options.sinks ?? [];
    this.clock = options.clock ?? (() => new Date());
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabledFor(level: LogLevel): boolean {
    return LOG_LEVEL_SEVERITY[level] >= LOG_LEVEL_SEVERITY[this.level];
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabledFor(level)) {
      return;
    }
    const record: LogRecord = {
      timestamp: this.clock(),
      name: this.name,
      level,
      message,
    };
    const line = formatLogRecord(record);
    for (const sink of this.sinks) {
      sink.write(line, record);
    }
  }

  debug(message: string): void {
    this.log("DEBUG", message);
  }

  info(message: string): void {
    this.log("INFO", message);
  }

  warning(message: string): void {
    this.log("WARNING", message);
  }

  error(message: string): void {
    this.log("ERROR", message);
  }
}

/**
 * Settings for {@link createLogger}.
 */
export interface LoggingConfig {
  /** Logger name shown in every record */
  name: string;
  /** Append-only log file; null disables file output */
  file: string | null;
  level: LogLevel;
  /** Also echo records to the console */
  console: boolean;
}

export function createLogger(config: LoggingConfig): Logger {
  const sinks: LogSink[] = [];
  if (config.file !== null) {
    sinks.push(new FileSink(config.file));
  }
  if (config.console) {
    sinks.push(new ConsoleSink());
  }
  return new Logger(config.name, { level: config.level, sinks });
}
