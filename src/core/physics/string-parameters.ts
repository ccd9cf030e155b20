/**
 * Vibrating string frequencies.
 *
 * A stretched string vibrates in its fundamental with a wave length of
 * twice its vibrating length. The wave speed is fixed by tension and mass,
 * so it is derived once from the open string and reused for every
 * stopped length.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import { millimetresToMetres } from "../constants.ts";

/**
 * Wave length of the fundamental when stopped at a given distance.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param distanceFromNut Stopping position, in mm
 * @returns Wave length in metres
 */
export function calcWaveLength(
  scaleLength: number,
  distanceFromNut: number
): number {
  return millimetresToMetres(scaleLength - distanceFromNut) * 2;
}

/**
 * Wave speed of a string tuned to `openFrequency`.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param openFrequency Open-string frequency in Hz
 * @returns Wave speed in m/s
 */
export function calcWaveSpeed(
  scaleLength: number,
  openFrequency: number
): number {
  return millimetresToMetres(scaleLength) * 2 * openFrequency;
}

/**
 * Frequency of a wave of the given speed and length.
 *
 * @throws RangeError if the wave length is not positive
 */
export function calcFrequency(waveSpeed: number, waveLength: number): number {
  if (!(waveLength > 0)) {
    throw new RangeError(`Wave length must be positive, got ${waveLength} m`);
  }
  return waveSpeed / waveLength;
}

/**
 * Frequencies of every string at every fret.
 *
 * @param scaleLength Distance from nut to bridge, in mm
 * @param frets Fret distances from the nut, in mm
 * @param openFrequencies Open-string frequencies in Hz
 * @returns table[string][fret]; fret 0 is the open string
 */
export function buildFretFrequencyTable(
  scaleLength: number,
  frets: readonly number[],
  openFrequencies: readonly number[]
): number[][] {
  const waveLengths = frets.map((fret) => calcWaveLength(scaleLength, fret));

  return openFrequencies.map((openFrequency) => {
    const waveSpeed = calcWaveSpeed(scaleLength, openFrequency);
    return [
      openFrequency,
      ...waveLengths.map((waveLength) => calcFrequency(waveSpeed, waveLength)),
    ];
  });
}
