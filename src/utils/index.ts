/**
 * Utilities for fret servo positioning
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 * License: GPL-3.0
 */

export * from "./logger.ts";
export * from "./report-formatter.ts";
