/**
 * Tests for constants and unit helpers
 */

import { describe, test, expect } from "vitest";
import {
  MusicalConstants,
  UnitConstants,
  calculateCentDifference,
  degreesToRadians,
  radiansToDegrees,
  millimetresToMetres,
} from "../../src/core/constants.ts";

describe("Musical Constants", () => {
  test("CENTS_IN_OCTAVE is 1200", () => {
    expect(MusicalConstants.CENTS_IN_OCTAVE).toBe(1200);
  });

  test("twelve half steps make an octave", () => {
    expect(MusicalConstants.HALF_STEP_FACTOR ** MusicalConstants.SEMITONES_IN_OCTAVE).toBeCloseTo(2, 12);
  });
});

describe("unit conversions", () => {
  test("180 degrees is pi radians", () => {
    expect(degreesToRadians(UnitConstants.STRAIGHT_ANGLE)).toBeCloseTo(Math.PI, 15);
  });

  test("radiansToDegrees inverts degreesToRadians", () => {
    expect(radiansToDegrees(degreesToRadians(37.5))).toBeCloseTo(37.5, 12);
  });

  test("648 mm is 0.648 m", () => {
    expect(millimetresToMetres(648)).toBeCloseTo(0.648, 12);
  });
});

describe("calculateCentDifference", () => {
  test("same frequency is 0 cents", () => {
    expect(calculateCentDifference(440, 440)).toBe(0);
    expect(calculateCentDifference(82.41, 82.41)).toBe(0);
  });

  test("octave is 1200 cents", () => {
    expect(calculateCentDifference(440, 880)).toBeCloseTo(1200, 10);
  });

  test("semitone is 100 cents", () => {
    const semitone = 440 * MusicalConstants.HALF_STEP_FACTOR;
    expect(calculateCentDifference(440, semitone)).toBeCloseTo(100, 8);
  });

  test("is symmetric and never negative", () => {
    const pairs: [number, number][] = [
      [82.41, 87.39],
      [110, 103.5],
      [329.63, 659.26],
    ];
    for (const [f1, f2] of pairs) {
      expect(calculateCentDifference(f1, f2)).toBe(calculateCentDifference(f2, f1));
      expect(calculateCentDifference(f1, f2)).toBeGreaterThan(0);
    }
  });

  test("rejects non-positive frequencies", () => {
    expect(() => calculateCentDifference(0, 440)).toThrow(RangeError);
    expect(() => calculateCentDifference(440, -1)).toThrow(RangeError);
    expect(() => calculateCentDifference(NaN, 440)).toThrow(RangeError);
  });
});
