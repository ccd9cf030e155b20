/**
 * Pitch error of the matched servo positions.
 *
 * Converts the displacement each fret match actually reaches into the
 * frequency the reference string would sound there, and compares it with
 * the equal-tempered target.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { calculateCentDifference } from "../constants.ts";
import {
  calcFrequency,
  calcWaveLength,
  calcWaveSpeed,
} from "../physics/string-parameters.ts";
import type { FretMatch } from "./fret-matcher.ts";

/**
 * Linkage angles of a matched sample, in degrees
 */
export interface LinkageAngles {
  alpha: number;
  beta: number;
  gamma: number;
}

/**
 * One line of the pitch deviation report.
 */
export interface ReportRow {
  /** Fret number; 0 is the open string */
  fret: number;
  /** Theoretical fret distance from the nut, in mm */
  targetDisplacement: number;
  /** Displacement reached by the nearest servo sample, in mm */
  achievedDisplacement: number;
  /** Equal-tempered frequency at the fret, in Hz */
  targetFrequency: number;
  /** Frequency sounded at the achieved displacement, in Hz */
  achievedFrequency: number;
  /** Unsigned pitch error, in cents */
  centDifference: number;
  /** Linkage angles of the match; null for the open string */
  angles: LinkageAngles | null;
}

/**
 * Inputs of {@link calcPitchDeviations}.
 */
export interface PitchDeviationInput {
  /** Distance from nut to bridge, in mm */
  scaleLength: number;
  /** Fret distances from the nut, in mm */
  frets: readonly number[];
  /** Fret-frequency matrix, indexed [string][fret] */
  fretFrequencies: readonly (readonly number[])[];
  /** Nearest servo sample per fret */
  matches: readonly FretMatch[];
  /** Row of the fret-frequency matrix to report on */
  referenceString: number;
}

/**
 * Frequency a string sounds when stopped at `displacement`.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param openFrequency Open-string frequency in Hz
 * @param displacement Stopping position, in mm
 */
export function calcAchievedFrequency(
  scaleLength: number,
  openFrequency: number,
  displacement: number
): number {
  return calcFrequency(
    calcWaveSpeed(scaleLength, openFrequency),
    calcWaveLength(scaleLength, displacement)
  );
}

/**
 * Build the report rows: the open string followed by one row per match.
 *
 * Every string shares the scale length, so the cent error is the same
 * whichever string is chosen as the reference.
 *
 * @throws RangeError if the reference string is not in the table
 */
export function calcPitchDeviations(input: PitchDeviationInput): ReportRow[] {
  const { scaleLength, frets, fretFrequencies, matches, referenceString } =
    input;
  const stringFrequencies = fretFrequencies[referenceString];
  if (stringFrequencies === undefined) {
    throw new RangeError(
      `Reference string ${referenceString} is not in the frequency table`
    );
  }
  const openFrequency = stringFrequencies[0];

  const rows: ReportRow[] = [
    {
      fret: 0,
      targetDisplacement: 0.0,
      achievedDisplacement: 0.0,
      targetFrequency: openFrequency,
      achievedFrequency: openFrequency,
      centDifference: 0.0,
      angles: null,
    },
  ];

  for (const { fretIndex, sample } of matches) {
    const targetFrequency = stringFrequencies[fretIndex + 1];
    const achievedFrequency = calcAchievedFrequency(
      scaleLength,
      openFrequency,
      sample.displacement
    );
    rows.push({
      fret: fretIndex + 1,
      targetDisplacement: frets[fretIndex],
      achievedDisplacement: sample.displacement,
      targetFrequency,
      achievedFrequency,
      centDifference: calculateCentDifference(targetFrequency, achievedFrequency),
      angles: { alpha: sample.alpha, beta: sample.beta, gamma: sample.gamma },
    });
  }

  return rows;
}
