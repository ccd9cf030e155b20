/**
 * Data models for fret servo positioning
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 * License: GPL-3.0
 */

// Run configuration
export * from "./configuration.ts";
