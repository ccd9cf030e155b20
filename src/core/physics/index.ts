/**
 * Physics module for vibrating strings.
 */

export {
  calcWaveLength,
  calcWaveSpeed,
  calcFrequency,
  buildFretFrequencyTable,
} from "./string-parameters.ts";
