/**
 * Fret Servo Positioning
 *
 * Geometry of a servo-driven guitar fretting mechanism: sweeps a servo's
 * pulse-width range through a two-link arm, matches the resulting
 * actuator displacements to equal-tempered fret positions and reports
 * the remaining pitch error in cents.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

// Core exports
export * from "./core/index.ts";

// Model exports
export * from "./models/index.ts";

// Utility exports
export * from "./utils/index.ts";

// Version info
export const VERSION = "0.1.0";
