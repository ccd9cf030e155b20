/**
 * Discretisation of a servo's pulse-width range into angle samples.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import type { LinkageSolver, SamplePoint } from "../geometry/linkage-solver.ts";

/**
 * Pulse-width characteristics of a hobby servo.
 */
export interface ServoSpecification {
  /** Pulse width at the start of travel, in microseconds */
  minMicros: number;
  /** Pulse width at the end of travel, in microseconds */
  maxMicros: number;
  /** Travel between minMicros and maxMicros, in degrees */
  maxDegrees: number;
  /** Pulse-width change the servo does not react to, in microseconds */
  deadBand: number;
}

/**
 * Usable pulse-width span, in microseconds
 */
export function calcServoRange(servo: ServoSpecification): number {
  return servo.maxMicros - servo.minMicros;
}

/**
 * Microseconds of pulse width per degree of travel
 */
export function calcServoPrecision(servo: ServoSpecification): number {
  return calcServoRange(servo) / servo.maxDegrees;
}

/**
 * Map a pulse width (relative to minMicros) onto a servo angle.
 *
 * The rescale multiplies and divides by maxDegrees, so the effective
 * mapping is micros / precision. Callers depend on these exact values.
 *
 * @param micros Pulse width above minMicros, in microseconds
 * @param precision Microseconds per degree
 * @param maxDegrees Servo travel, in degrees
 * @returns Angle in degrees; 0 for non-positive pulse widths
 */
export function microsToDegrees(
  micros: number,
  precision: number = 10.0,
  maxDegrees: number = 180.0
): number {
  return micros > 0 ? (maxDegrees * micros) / maxDegrees / precision : 0.0;
}

/**
 * Pulse widths to sample, from 0 to the full range inclusive, one step
 * per whole microsecond of precision.
 *
 * @throws RangeError if the precision is below one microsecond per degree
 */
export function pulseWidthSteps(servo: ServoSpecification): number[] {
  const end = Math.trunc(calcServoRange(servo) + 1);
  const step = Math.trunc(calcServoPrecision(servo));
  if (!(step >= 1)) {
    throw new RangeError(
      `Servo precision of ${calcServoPrecision(servo)} us/degree is below one microsecond`
    );
  }

  const steps: number[] = [];
  for (let micros = 0; micros < end; micros += step) {
    steps.push(micros);
  }
  return steps;
}

/**
 * Solve the linkage for every sampled pulse width, in ascending order.
 *
 * @param servo Servo specification
 * @param solver Linkage solver for the mounted arm
 * @param frets Fret distances from the nut, in mm
 */
export function sampleServoRange(
  servo: ServoSpecification,
  solver: LinkageSolver,
  frets: readonly number[]
): SamplePoint[] {
  const precision = calcServoPrecision(servo);
  return pulseWidthSteps(servo).map((micros) =>
    solver.solve(microsToDegrees(micros, precision, servo.maxDegrees), frets)
  );
}
