/**
 * Configuration of a positioning run: instrument, linkage, servo,
 * report and logging settings.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { readFileSync } from "node:fs";
import type { ArmLinkage } from "../core/geometry/linkage-solver.ts";
import {
  type ServoSpecification,
  calcServoPrecision,
} from "../core/servo/servo-sampler.ts";
import { type LoggingConfig, LOG_LEVELS, isLogLevel } from "../utils/logger.ts";
import {
  type ReportFormat,
  REPORT_FORMATS,
  isReportFormat,
} from "../utils/report-formatter.ts";

// ============================================================================
// Types
// ============================================================================

export interface InstrumentConfig {
  /** Distance from nut to bridge (mensur), in mm */
  scaleLength: number;
  /** Number of frets to position */
  fretCount: number;
  /** Open-string frequencies in Hz, lowest string first */
  openStringFrequencies: number[];
  /** Index of the string the report is calculated for */
  referenceString: number;
}

export interface ReportConfig {
  format: ReportFormat;
}

export interface PositioningConfig {
  instrument: InstrumentConfig;
  linkage: ArmLinkage;
  servo: ServoSpecification;
  report: ReportConfig;
  logging: LoggingConfig;
}

/**
 * Per-section overrides accepted by {@link createConfiguration}.
 */
export interface PositioningConfigOverrides {
  instrument?: Partial<InstrumentConfig>;
  linkage?: Partial<ArmLinkage>;
  servo?: Partial<ServoSpecification>;
  report?: Partial<ReportConfig>;
  logging?: Partial<LoggingConfig>;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Six-string guitar in standard tuning (E A D G B e) with the servo arm
 * of the prototype fretting mechanism.
 */
export const DEFAULT_CONFIGURATION: PositioningConfig = {
  instrument: {
    scaleLength: 648.0,
    fretCount: 13,
    openStringFrequencies: [82.41, 110.0, 146.83, 196.0, 246.94, 329.63],
    referenceString: 0,
  },
  linkage: {
    armA: 206.1,
    armB: 275.32,
    offsetE: 36.38,
    baselineOffset: 50.0,
  },
  servo: {
    minMicros: 600,
    maxMicros: 2400,
    maxDegrees: 180.0,
    deadBand: 2.0,
  },
  report: {
    format: "full",
  },
  logging: {
    name: "servo positioning",
    file: "log/servo-positioning.log",
    level: "DEBUG",
    console: true,
  },
};

/**
 * Create a configuration from the defaults and per-section overrides
 */
export function createConfiguration(
  overrides: PositioningConfigOverrides = {}
): PositioningConfig {
  const defaults = DEFAULT_CONFIGURATION;
  return {
    instrument: {
      ...defaults.instrument,
      openStringFrequencies: [...defaults.instrument.openStringFrequencies],
      ...overrides.instrument,
    },
    linkage: { ...defaults.linkage, ...overrides.linkage },
    servo: { ...defaults.servo, ...overrides.servo },
    report: { ...defaults.report, ...overrides.report },
    logging: { ...defaults.logging, ...overrides.logging },
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a configuration.
 * @returns List of error messages; empty if the configuration is usable
 */
export function validateConfiguration(config: PositioningConfig): string[] {
  const errors: string[] = [];
  const { instrument, linkage, servo } = config;

  if (!(instrument.scaleLength > 0)) {
    errors.push("Scale length must be positive.");
  }
  if (!Number.isInteger(instrument.fretCount) || instrument.fretCount < 1) {
    errors.push("Fret count must be a whole number of at least 1.");
  }
  if (instrument.openStringFrequencies.length === 0) {
    errors.push("Enter at least one open-string frequency.");
  }
  if (instrument.openStringFrequencies.some((frequency) => !(frequency > 0))) {
    errors.push("Open-string frequencies must be positive.");
  }
  if (
    !Number.isInteger(instrument.referenceString) ||
    instrument.referenceString < 0 ||
    instrument.referenceString >= instrument.openStringFrequencies.length
  ) {
    errors.push("Reference string must be the index of an open string.");
  }

  if (!(linkage.armA > 0) || !(linkage.armB > 0)) {
    errors.push("Linkage arm lengths must be positive.");
  }
  if (!(linkage.offsetE >= 0) || !(linkage.baselineOffset >= 0)) {
    errors.push("Linkage offsets must not be negative.");
  }

  if (!(servo.minMicros >= 0)) {
    errors.push("Minimum pulse width must not be negative.");
  }
  if (!(servo.maxMicros > servo.minMicros)) {
    errors.push("Maximum pulse width must exceed the minimum pulse width.");
  }
  if (!(servo.maxDegrees > 0)) {
    errors.push("Servo travel must be positive.");
  }
  if (!(servo.deadBand >= 0)) {
    errors.push("Servo dead band must not be negative.");
  }
  if (servo.maxMicros > servo.minMicros && servo.maxDegrees > 0) {
    const step = Math.trunc(calcServoPrecision(servo));
    if (step < 1) {
      errors.push("Servo precision must be at least 1 microsecond per degree.");
    } else if (step < servo.deadBand) {
      errors.push("Pulse-width step must not be smaller than the servo dead band.");
    }
  }

  return errors;
}

/**
 * Throw if the configuration is not usable
 */
export function assertValidConfiguration(config: PositioningConfig): void {
  const errors = validateConfiguration(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  ${errors.join("\n  ")}`);
  }
}

// ============================================================================
// JSON parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields from one section of a JSON document, collecting
 * type errors instead of throwing on the first one.
 */
class SectionReader {
  constructor(
    private readonly section: string,
    private readonly source: Record<string, unknown>,
    private readonly errors: string[]
  ) {}

  number(key: string, fallback: number): number {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    this.errors.push(`${this.section}.${key} must be a number.`);
    return fallback;
  }

  numberArray(key: string, fallback: number[]): number[] {
    const value = this.source[key];
    if (value === undefined) return [...fallback];
    if (Array.isArray(value)) {
      const numbers = value.filter(
        (item): item is number => typeof item === "number" && Number.isFinite(item)
      );
      if (numbers.length === value.length) return numbers;
    }
    this.errors.push(`${this.section}.${key} must be a list of numbers.`);
    return [...fallback];
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (typeof value === "boolean") return value;
    this.errors.push(`${this.section}.${key} must be true or false.`);
    return fallback;
  }

  string(key: string, fallback: string): string {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (typeof value === "string") return value;
    this.errors.push(`${this.section}.${key} must be a string.`);
    return fallback;
  }

  nullableString(key: string, fallback: string | null): string | null {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (value === null || typeof value === "string") return value;
    this.errors.push(`${this.section}.${key} must be a string or null.`);
    return fallback;
  }

  oneOf<T extends string>(
    key: string,
    fallback: T,
    guard: (value: unknown) => value is T,
    allowed: readonly T[]
  ): T {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (guard(value)) return value;
    this.errors.push(`${this.section}.${key} must be one of ${allowed.join(", ")}.`);
    return fallback;
  }
}

/**
 * Build a configuration from parsed JSON. Missing fields take their
 * default values.
 *
 * @throws Error listing every type or validation problem
 */
export function parseConfiguration(json: unknown): PositioningConfig {
  if (!isRecord(json)) {
    throw new Error("Invalid configuration:\n  Configuration must be a JSON object.");
  }

  const errors: string[] = [];
  const section = (name: string): SectionReader => {
    const value = json[name];
    if (value !== undefined && !isRecord(value)) {
      errors.push(`${name} must be an object.`);
    }
    return new SectionReader(name, isRecord(value) ? value : {}, errors);
  };

  const defaults = DEFAULT_CONFIGURATION;
  const instrument = section("instrument");
  const linkage = section("linkage");
  const servo = section("servo");
  const report = section("report");
  const logging = section("logging");

  const config: PositioningConfig = {
    instrument: {
      scaleLength: instrument.number("scaleLength", defaults.instrument.scaleLength),
      fretCount: instrument.number("fretCount", defaults.instrument.fretCount),
      openStringFrequencies: instrument.numberArray(
        "openStringFrequencies",
        defaults.instrument.openStringFrequencies
      ),
      referenceString: instrument.number(
        "referenceString",
        defaults.instrument.referenceString
      ),
    },
    linkage: {
      armA: linkage.number("armA", defaults.linkage.armA),
      armB: linkage.number("armB", defaults.linkage.armB),
      offsetE: linkage.number("offsetE", defaults.linkage.offsetE),
      baselineOffset: linkage.number("baselineOffset", defaults.linkage.baselineOffset),
    },
    servo: {
      minMicros: servo.number("minMicros", defaults.servo.minMicros),
      maxMicros: servo.number("maxMicros", defaults.servo.maxMicros),
      maxDegrees: servo.number("maxDegrees", defaults.servo.maxDegrees),
      deadBand: servo.number("deadBand", defaults.servo.deadBand),
    },
    report: {
      format: report.oneOf(
        "format",
        defaults.report.format,
        isReportFormat,
        REPORT_FORMATS
      ),
    },
    logging: {
      name: logging.string("name", defaults.logging.name),
      file: logging.nullableString("file", defaults.logging.file),
      level: logging.oneOf("level", defaults.logging.level, isLogLevel, LOG_LEVELS),
      console: logging.boolean("console", defaults.logging.console),
    },
  };

  errors.push(...validateConfiguration(config));
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  ${errors.join("\n  ")}`);
  }
  return config;
}

/**
 * Read and parse a JSON configuration file
 */
export function loadConfiguration(path: string): PositioningConfig {
  const text = readFileSync(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Configuration file ${path} is not valid JSON: ${reason}`);
  }
  return parseConfiguration(json);
}
