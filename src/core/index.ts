/**
 * Core functionality for fret servo positioning
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 * License: GPL-3.0
 */

// Constants and unit conversions
export * from "./constants.ts";

// Geometry module (fret layout, arm linkage)
export * from "./geometry/index.ts";

// Physics module (string frequencies)
export * from "./physics/index.ts";

// Servo module (pulse-width sampling)
export * from "./servo/index.ts";

// Modelling (fret matching, pitch deviation, complete run)
export * from "./modelling/index.ts";
