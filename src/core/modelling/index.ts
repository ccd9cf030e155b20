/**
 * Modelling module for fret positioning.
 *
 * This module matches servo positions to frets and rates the
 * resulting pitch error.
 */

export { type FretMatch, findNearestFretPoints } from "./fret-matcher.ts";

export {
  type LinkageAngles,
  type ReportRow,
  type PitchDeviationInput,
  calcAchievedFrequency,
  calcPitchDeviations,
} from "./pitch-deviation.ts";

export {
  type PositioningResult,
  calculatePositioning,
  runPositioning,
} from "./positioning-calculator.ts";
