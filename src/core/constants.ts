/**
 * Global constants and unit helpers used across the project.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

/** Number of equal-tempered semitones in an octave */
const SEMITONES_IN_OCTAVE = 12;

/**
 * Musical constants
 */
export const MusicalConstants = {
  SEMITONES_IN_OCTAVE,

  /** Ratio between two adjacent equal-tempered semitones (twelfth root of 2) */
  HALF_STEP_FACTOR: 2 ** (1 / SEMITONES_IN_OCTAVE),

  /** Number of cents in an octave */
  CENTS_IN_OCTAVE: 1200,
} as const;

/**
 * Length and angle conversion constants
 */
export const UnitConstants = {
  /** Millimetres in one metre */
  MM_PER_METRE: 1000.0,

  /** Degrees in a straight angle (sum of the angles of a triangle) */
  STRAIGHT_ANGLE: 180.0,
} as const;

/**
 * Convert an angle in degrees to radians
 */
export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / UnitConstants.STRAIGHT_ANGLE;
}

/**
 * Convert an angle in radians to degrees
 */
export function radiansToDegrees(radians: number): number {
  return (radians * UnitConstants.STRAIGHT_ANGLE) / Math.PI;
}

/**
 * Convert a length in millimetres to metres
 */
export function millimetresToMetres(millimetres: number): number {
  return millimetres / UnitConstants.MM_PER_METRE;
}

/**
 * Calculate the unsigned interval between two frequencies in cents.
 *
 * The larger frequency is always divided by the smaller one, so the result
 * is never negative and does not depend on argument order.
 *
 * @param f1 First frequency in Hz
 * @param f2 Second frequency in Hz
 * @returns Difference of f1 and f2 in cents
 * @throws RangeError if either frequency is not positive
 */
export function calculateCentDifference(f1: number, f2: number): number {
  if (!(f1 > 0) || !(f2 > 0)) {
    throw new RangeError(
      `Cent difference needs positive frequencies, got ${f1} Hz and ${f2} Hz`
    );
  }
  const ratio = f1 > f2 ? f1 / f2 : f2 / f1;
  return MusicalConstants.CENTS_IN_OCTAVE * Math.log2(ratio);
}
