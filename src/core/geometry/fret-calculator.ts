/**
 * Equal-tempered fret positions along a string.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { MusicalConstants } from "../constants.ts";

/**
 * Calculate the distance of one fret from the nut.
 *
 * Stopping the string at fret n shortens the vibrating length to
 * L / r^n, with r the semitone ratio.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param fret Fret number, 1 being the fret nearest the nut
 * @returns Distance from the nut, in mm
 */
export function calcFretDistance(scaleLength: number, fret: number): number {
  return scaleLength - scaleLength / MusicalConstants.HALF_STEP_FACTOR ** fret;
}

/**
 * Calculate the positions of the first `fretCount` frets.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param fretCount Number of frets
 * @returns Distances from the nut in mm; index 0 is the first fret
 */
export function calcFretPositions(
  scaleLength: number,
  fretCount: number
): number[] {
  const frets: number[] = [];
  for (let fret = 1; fret <= fretCount; fret++) {
    frets.push(calcFretDistance(scaleLength, fret));
  }
  return frets;
}
