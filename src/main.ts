/**
 * Process entry point.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 * License: GPL-3.0
 */

import { runCli } from "./cli.ts";

process.exitCode = runCli(process.argv.slice(2));
