/**
 * Tests for report formatting
 */

import { describe, test, expect } from "vitest";
import {
  REPORT_HEADERS,
  formatFixed,
  formatReport,
  formatReportRow,
  isReportFormat,
} from "../../src/utils/report-formatter.ts";
import type { ReportRow } from "../../src/core/modelling/pitch-deviation.ts";

const openRow: ReportRow = {
  fret: 0,
  targetDisplacement: 0,
  achievedDisplacement: 0,
  targetFrequency: 110,
  achievedFrequency: 110,
  centDifference: 0,
  angles: null,
};

const fretRow: ReportRow = {
  fret: 12,
  targetDisplacement: 324,
  achievedDisplacement: 323.404,
  targetFrequency: 220,
  achievedFrequency: 219.5951,
  centDifference: 3.1896,
  angles: { alpha: 32.581, beta: 46, gamma: 101.419 },
};

describe("formatFixed", () => {
  test("pads to the column width", () => {
    expect(formatFixed(3.14159, 6)).toBe("  3.14");
    expect(formatFixed(1234.5, 6)).toBe("1234.50");
  });

  test("honours the number of decimals", () => {
    expect(formatFixed(2.5, 5, 0)).toBe("    3");
    expect(formatFixed(0.1234, 7, 3)).toBe("  0.123");
  });
});

describe("formatReportRow", () => {
  test("full open-string row has placeholder angles", () => {
    expect(formatReportRow(openRow, "full")).toBe(
      " 0 &   0.00 &   0.00 & 110.00 & 110.00 &  0.00 &   -    &   -    &   -    "
    );
  });

  test("full fret row lists the linkage angles", () => {
    expect(formatReportRow(fretRow, "full")).toBe(
      "12 & 324.00 & 323.40 & 220.00 & 219.60 &  3.19 &  32.58 &  46.00 & 101.42"
    );
  });

  test("compact rows stop after the cent difference", () => {
    expect(formatReportRow(openRow, "compact")).toBe(
      " 0 &   0.00 &   0.00 & 110.00 & 110.00 &  0.00"
    );
    expect(formatReportRow(fretRow, "compact")).toBe(
      "12 & 324.00 & 323.40 & 220.00 & 219.60 &  3.19"
    );
  });
});

describe("formatReport", () => {
  test("starts with the header of the chosen format", () => {
    const lines = formatReport([openRow, fretRow], "full");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(REPORT_HEADERS.full);
    expect(lines[2]).toBe(formatReportRow(fretRow, "full"));
  });

  test("empty report is just the header", () => {
    expect(formatReport([], "compact")).toEqual([
      "fret actual   nearest  actual   nearest   difference",
    ]);
  });
});

describe("isReportFormat", () => {
  test("accepts the known formats only", () => {
    expect(isReportFormat("full")).toBe(true);
    expect(isReportFormat("compact")).toBe(true);
    expect(isReportFormat("latex")).toBe(false);
    expect(isReportFormat(undefined)).toBe(false);
  });
});
