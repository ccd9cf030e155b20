/**
 * Matching of continuous servo positions to discrete fret targets.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import type { SamplePoint } from "../geometry/linkage-solver.ts";

/**
 * Sample that comes closest to a fret.
 */
export interface FretMatch {
  /** Index into the fret set; 0 is the first fret */
  fretIndex: number;
  sample: SamplePoint;
}

/**
 * Find the sample nearest to each fret.
 *
 * For every fret the sample with the smallest absolute deviation wins.
 * On ties the earlier sample (lower pulse width) is kept.
 *
 * @param points Samples in ascending pulse-width order
 * @param frets Fret distances from the nut, in mm
 * @returns One match per fret, or an empty list if there are no samples
 */
export function findNearestFretPoints(
  points: readonly SamplePoint[],
  frets: readonly number[]
): FretMatch[] {
  const first = points[0];
  if (first === undefined) {
    return [];
  }

  return frets.map((_, fretIndex) => {
    let best = first;
    let bestDeviation = Math.abs(first.deviations[fretIndex]);
    for (const point of points) {
      const deviation = Math.abs(point.deviations[fretIndex]);
      if (deviation < bestDeviation) {
        best = point;
        bestDeviation = deviation;
      }
    }
    return { fretIndex, sample: best };
  });
}
