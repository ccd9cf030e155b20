/**
 * Text rendering of the pitch deviation report.
 *
 * Columns are separated by `&` so that the lines can be pasted into a
 * typeset table.
 *
 * Copyright (C) 2026, Fret Servo Positioning Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import type { ReportRow } from "../core/modelling/pitch-deviation.ts";

/**
 * `full` includes the linkage angles; `compact` stops after the cent error.
 */
export type ReportFormat = "full" | "compact";

export const REPORT_FORMATS: readonly ReportFormat[] = ["full", "compact"];

export function isReportFormat(value: unknown): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export const REPORT_HEADERS: Record<ReportFormat, string> = {
  full: "fret actual   nearest  actual   nearest   diff    alpha    beta    gamma",
  compact: "fret actual   nearest  actual   nearest   difference",
};

/** Angle columns of the open-string row */
const NO_ANGLES = "  -    &   -    &   -    ";

/**
 * Fixed-point number right-aligned in `width` characters
 */
export function formatFixed(
  value: number,
  width: number,
  decimals: number = 2
): string {
  return value.toFixed(decimals).padStart(width);
}

export function formatReportRow(row: ReportRow, format: ReportFormat): string {
  const columns = [
    String(row.fret).padStart(2),
    formatFixed(row.targetDisplacement, 6),
    formatFixed(row.achievedDisplacement, 6),
    formatFixed(row.targetFrequency, 6),
    formatFixed(row.achievedFrequency, 6),
    formatFixed(row.centDifference, 5),
  ];

  if (format === "full") {
    if (row.angles === null) {
      columns.push(NO_ANGLES);
    } else {
      columns.push(
        formatFixed(row.angles.alpha, 6),
        formatFixed(row.angles.beta, 6),
        formatFixed(row.angles.gamma, 6)
      );
    }
  }

  return columns.join(" & ");
}

/**
 * Header line followed by one line per row
 */
export function formatReport(
  rows: readonly ReportRow[],
  format: ReportFormat
): string[] {
  return [REPORT_HEADERS[format], ...rows.map((row) => formatReportRow(row, format))];
}
