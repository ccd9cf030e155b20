/**
 * Servo pulse-width sampling.
 */

export {
  type ServoSpecification,
  calcServoRange,
  calcServoPrecision,
  microsToDegrees,
  pulseWidthSteps,
  sampleServoRange,
} from "./servo-sampler.ts";
