/**
 * Command line interface for a positioning run.
 *
 * Usage: fret-servo [--config <file>] [--format full|compact]
 *                   [--log-file <path>] [--log-level <level>] [--quiet]
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { parseArgs } from "node:util";
import {
  type PositioningConfig,
  createConfiguration,
  loadConfiguration,
} from "./models/configuration.ts";
import { runPositioning } from "./core/modelling/positioning-calculator.ts";
import {
  type Logger,
  type LogLevel,
  LOG_LEVELS,
  createLogger,
  isLogLevel,
} from "./utils/logger.ts";
import {
  type ReportFormat,
  REPORT_FORMATS,
  isReportFormat,
} from "./utils/report-formatter.ts";

export interface CliOptions {
  configPath?: string;
  format?: ReportFormat;
  logFile?: string;
  logLevel?: LogLevel;
  quiet: boolean;
}

/**
 * Parse command line arguments (without the node and script paths).
 *
 * @throws Error on unknown options or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      format: { type: "string", short: "f" },
      "log-file": { type: "string" },
      "log-level": { type: "string" },
      quiet: { type: "boolean", short: "q", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const format = values.format;
  if (format !== undefined && !isReportFormat(format)) {
    throw new Error(`--format must be one of ${REPORT_FORMATS.join(", ")}`);
  }
  const logLevel = values["log-level"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
  }

  return {
    configPath: values.config,
    format,
    logFile: values["log-file"],
    logLevel,
    quiet: values.quiet ?? false,
  };
}

/**
 * Apply command line overrides on top of the loaded configuration
 */
export function resolveConfiguration(options: CliOptions): PositioningConfig {
  const base =
    options.configPath !== undefined
      ? loadConfiguration(options.configPath)
      : createConfiguration();

  return {
    ...base,
    report: { format: options.format ?? base.report.format },
    logging: {
      ...base.logging,
      file: options.logFile ?? base.logging.file,
      level: options.logLevel ?? base.logging.level,
      console: options.quiet ? false : base.logging.console,
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI.
 * @returns Process exit code
 */
export function runCli(argv: string[]): number {
  let config: PositioningConfig;
  let logger: Logger;
  try {
    config = resolveConfiguration(parseCliArgs(argv));
    logger = createLogger(config.logging);
  } catch (error) {
    console.error(describeError(error));
    return 2;
  }

  try {
    runPositioning(config, logger);
    return 0;
  } catch (error) {
    const message = `Positioning failed: ${describeError(error)}`;
    try {
      logger.error(message);
    } catch (logError) {
      console.error(message);
      console.error(`Logging failed: ${describeError(logError)}`);
    }
    return 1;
  }
}
