/**
 * Complete positioning run: fret geometry, string frequencies, servo
 * sampling, fret matching and pitch deviation.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { calcFretPositions } from "../geometry/fret-calculator.ts";
import { LinkageSolver, type SamplePoint } from "../geometry/linkage-solver.ts";
import { buildFretFrequencyTable } from "../physics/string-parameters.ts";
import { sampleServoRange } from "../servo/servo-sampler.ts";
import { type FretMatch, findNearestFretPoints } from "./fret-matcher.ts";
import { type ReportRow, calcPitchDeviations } from "./pitch-deviation.ts";
import {
  type PositioningConfig,
  assertValidConfiguration,
} from "../../models/configuration.ts";
import type { Logger } from "../../utils/logger.ts";
import { formatReport } from "../../utils/report-formatter.ts";

/**
 * Every intermediate result of a run.
 */
export interface PositioningResult {
  /** Fret distances from the nut, in mm */
  frets: number[];
  /** Frequencies indexed [string][fret], in Hz */
  fretFrequencies: number[][];
  /** Linkage solutions in ascending pulse-width order */
  samples: SamplePoint[];
  /** Nearest sample per fret */
  matches: FretMatch[];
  /** Report rows for the reference string, open string first */
  rows: ReportRow[];
}

const START_BANNER = `${"=".repeat(19)} START ${"=".repeat(19)}`;
const END_BANNER = `${"=".repeat(20)} END ${"=".repeat(20)}`;

/**
 * Run the calculation without logging.
 *
 * @throws Error if the configuration is invalid
 * @throws RangeError if the geometry yields an undefined value
 */
export function calculatePositioning(config: PositioningConfig): PositioningResult {
  assertValidConfiguration(config);
  const { instrument, linkage, servo } = config;

  const frets = calcFretPositions(instrument.scaleLength, instrument.fretCount);
  const fretFrequencies = buildFretFrequencyTable(
    instrument.scaleLength,
    frets,
    instrument.openStringFrequencies
  );
  const samples = sampleServoRange(servo, new LinkageSolver(linkage), frets);
  const matches = findNearestFretPoints(samples, frets);
  const rows = calcPitchDeviations({
    scaleLength: instrument.scaleLength,
    frets,
    fretFrequencies,
    matches,
    referenceString: instrument.referenceString,
  });

  return { frets, fretFrequencies, samples, matches, rows };
}

/**
 * Run the calculation and write intermediate data (DEBUG) and the
 * formatted report (INFO) to the logger.
 */
export function runPositioning(
  config: PositioningConfig,
  logger: Logger
): PositioningResult {
  logger.info(START_BANNER);

  const result = calculatePositioning(config);
  if (logger.isEnabledFor("DEBUG")) {
    logger.debug(JSON.stringify(result.fretFrequencies));
    logger.debug(JSON.stringify(result.samples));
    logger.debug(JSON.stringify(result.matches));
  }

  for (const line of formatReport(result.rows, config.report.format)) {
    logger.info(line);
  }

  logger.info(END_BANNER);
  return result;
}
