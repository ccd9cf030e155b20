/**
 * Geometry calculators.
 *
 * This module provides the fret layout of the instrument and the
 * triangle solution of the servo arm linkage.
 */

export { calcFretDistance, calcFretPositions } from "./fret-calculator.ts";
export {
  type ArmLinkage,
  type LinkagePosition,
  type SamplePoint,
  LinkageSolver,
  calcAlpha,
  calcHypotenuse,
} from "./linkage-solver.ts";
