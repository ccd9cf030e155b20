/**
 * Two-link servo arm geometry.
 *
 * The servo horn (arm a) and the connecting rod (arm b) form a triangle
 * with the line from the servo axis to the rod's slider joint. Given the
 * servo angle beta, the law of sines yields alpha, the angle sum yields
 * gamma, and the law of cosines yields the hypotenuse c. The actuator
 * displacement follows from c and the fixed offset e by Pythagoras.
 *
 * All angles are in degrees; lengths are in mm.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import {
  UnitConstants,
  degreesToRadians,
  radiansToDegrees,
} from "../constants.ts";

/**
 * Mounting geometry of the servo arm linkage.
 */
export interface ArmLinkage {
  /** Length of the servo horn (side a), in mm */
  armA: number;
  /** Length of the connecting rod (side b), in mm */
  armB: number;
  /** Perpendicular offset of the slider from the servo axis, in mm */
  offsetE: number;
  /** Displacement subtracted so that 0 corresponds to the nut, in mm */
  baselineOffset: number;
}

/**
 * Triangle solved for a single servo angle.
 */
export interface LinkagePosition {
  /** Actuator displacement, in mm */
  readonly displacement: number;
  /** Side c of the triangle, in mm */
  readonly hypotenuse: number;
  readonly alpha: number;
  readonly beta: number;
  readonly gamma: number;
}

/**
 * A solved servo position together with its deviation to every fret.
 */
export interface SamplePoint extends LinkagePosition {
  /** deviations[i] = displacement - frets[i], in mm */
  readonly deviations: readonly number[];
}

/**
 * Calculate alpha by the law of sines: a / sin(alpha) = b / sin(beta).
 *
 * @param a Length of side a
 * @param b Length of side b
 * @param beta Angle opposite side b, in degrees
 * @returns Angle alpha opposite side a, in degrees
 * @throws RangeError if b is zero or no triangle exists for the inputs
 */
export function calcAlpha(a: number, b: number, beta: number): number {
  if (b === 0) {
    throw new RangeError("Side b of the linkage must not be zero");
  }
  const sinAlpha = (a * Math.sin(degreesToRadians(beta))) / b;
  if (!(sinAlpha >= -1 && sinAlpha <= 1)) {
    throw new RangeError(
      `No triangle for a=${a}, b=${b}, beta=${beta}: sin(alpha)=${sinAlpha}`
    );
  }
  return radiansToDegrees(Math.asin(sinAlpha));
}

/**
 * Calculate the third side by the law of cosines.
 *
 * @param gamma Angle enclosed by sides a and b, in degrees
 */
export function calcHypotenuse(a: number, b: number, gamma: number): number {
  return Math.sqrt(a ** 2 + b ** 2 - 2 * a * b * Math.cos(degreesToRadians(gamma)));
}

/**
 * Solves the linkage for individual servo angles.
 */
export class LinkageSolver {
  private readonly linkage: ArmLinkage;

  constructor(linkage: ArmLinkage) {
    this.linkage = linkage;
  }

  getLinkage(): ArmLinkage {
    return this.linkage;
  }

  /**
   * Solve the triangle for a servo angle.
   *
   * @param beta Servo angle, in degrees
   * @throws RangeError if the geometry has no solution at this angle
   */
  calcPosition(beta: number): LinkagePosition {
    const { armA, armB, offsetE, baselineOffset } = this.linkage;
    const alpha = calcAlpha(armA, armB, beta);
    const gamma = UnitConstants.STRAIGHT_ANGLE - alpha - beta;
    const hypotenuse = calcHypotenuse(armA, armB, gamma);

    const legSquared = hypotenuse ** 2 - offsetE ** 2;
    if (legSquared < 0) {
      throw new RangeError(
        `Offset e=${offsetE} exceeds hypotenuse c=${hypotenuse} at beta=${beta}`
      );
    }
    const displacement = Math.sqrt(legSquared) - baselineOffset;

    return { displacement, hypotenuse, alpha, beta, gamma };
  }

  /**
   * Solve the triangle for a servo angle and measure it against the frets.
   *
   * @param beta Servo angle, in degrees
   * @param frets Fret distances from the nut, in mm
   */
  solve(beta: number, frets: readonly number[]): SamplePoint {
    const position = this.calcPosition(beta);
    return {
      ...position,
      deviations: frets.map((fret) => position.displacement - fret),
    };
  }
}
