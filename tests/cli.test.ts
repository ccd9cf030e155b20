/**
 * Tests for the command line interface
 */

import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseCliArgs, resolveConfiguration, runCli } from "../src/cli.ts";
import { DEFAULT_CONFIGURATION } from "../src/models/configuration.ts";

describe("parseCliArgs", () => {
  test("no arguments", () => {
    expect(parseCliArgs([])).toEqual({
      configPath: undefined,
      format: undefined,
      logFile: undefined,
      logLevel: undefined,
      quiet: false,
    });
  });

  test("all options", () => {
    expect(
      parseCliArgs([
        "-c",
        "servo.json",
        "--format",
        "compact",
        "--log-file",
        "out.log",
        "--log-level",
        "WARNING",
        "-q",
      ])
    ).toEqual({
      configPath: "servo.json",
      format: "compact",
      logFile: "out.log",
      logLevel: "WARNING",
      quiet: true,
    });
  });

  test("rejects unknown formats and levels", () => {
    expect(() => parseCliArgs(["--format", "latex"])).toThrow("--format must be one of full, compact");
    expect(() => parseCliArgs(["--log-level", "TRACE"])).toThrow(
      "--log-level must be one of DEBUG, INFO, WARNING, ERROR"
    );
  });

  test("rejects unknown options", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow();
  });
});

describe("resolveConfiguration", () => {
  test("applies overrides on top of the defaults", () => {
    const config = resolveConfiguration({
      format: "compact",
      logFile: "other.log",
      logLevel: "ERROR",
      quiet: true,
    });
    expect(config.instrument).toEqual(DEFAULT_CONFIGURATION.instrument);
    expect(config.report.format).toBe("compact");
    expect(config.logging).toEqual({
      name: "servo positioning",
      file: "other.log",
      level: "ERROR",
      console: false,
    });
  });

  test("keeps configured values when no override is given", () => {
    const config = resolveConfiguration({ quiet: false });
    expect(config).toEqual(DEFAULT_CONFIGURATION);
  });
});

describe("runCli", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "fret-servo-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(directory, { recursive: true, force: true });
  });

  test("writes the report to the log file and exits 0", () => {
    const logFile = join(directory, "log", "servo.log");
    const code = runCli(["--log-file", logFile, "--log-level", "INFO", "--quiet"]);

    expect(code).toBe(0);
    const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(17);
    expect(lines[0].endsWith(" - servo positioning - INFO - =================== START ===================")).toBe(true);
    expect(lines[3].endsWith(
      " - INFO -  1 &  36.37 &  36.93 &  87.31 &  87.39 &  1.58 &  35.57 & 129.00 &  15.43"
    )).toBe(true);
    expect(console.log).not.toHaveBeenCalled();
  });

  test("echoes to the console unless quiet", () => {
    const logFile = join(directory, "servo.log");
    const code = runCli(["--log-file", logFile, "--log-level", "INFO", "-f", "compact"]);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(17);
  });

  test("reads a configuration file", () => {
    const configPath = join(directory, "bass.json");
    const logFile = join(directory, "bass.log");
    writeFileSync(
      configPath,
      JSON.stringify({
        instrument: { scaleLength: 864, fretCount: 5, openStringFrequencies: [41.2, 55, 73.42, 98] },
        logging: { file: logFile, level: "INFO", console: false },
      })
    );

    expect(runCli(["--config", configPath])).toBe(0);
    const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(9);
    expect(lines[2].endsWith(" - INFO -  0 &   0.00 &   0.00 &  41.20 &  41.20 &  0.00 &   -    &   -    &   -    ")).toBe(true);
  });

  test("exits 2 on invalid arguments", () => {
    expect(runCli(["--format", "latex"])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("--format must be one of full, compact");
  });

  test("exits 2 on an invalid configuration file", () => {
    const configPath = join(directory, "broken.json");
    writeFileSync(configPath, "{ not json");
    expect(runCli(["--config", configPath, "--quiet"])).toBe(2);
  });

  test("logs geometry failures and exits 1", () => {
    const configPath = join(directory, "impossible.json");
    const logFile = join(directory, "impossible.log");
    writeFileSync(
      configPath,
      JSON.stringify({
        linkage: { armA: 300, armB: 100 },
        logging: { file: logFile, level: "INFO", console: false },
      })
    );

    expect(runCli(["--config", configPath])).toBe(1);
    const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain(" - ERROR - Positioning failed: No triangle for a=300, b=100");
  });

  test("exits 2 when the log file cannot be created", () => {
    const blocker = join(directory, "blocker");
    writeFileSync(blocker, "");

    expect(runCli(["--log-file", join(blocker, "servo.log")])).toBe(2);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  test("reports on the console and exits 1 when the log file cannot be written", () => {
    const code = runCli(["--log-file", directory, "--quiet"]);

    expect(code).toBe(1);
    const messages = vi.mocked(console.error).mock.calls.map(([message]) => String(message));
    expect(messages).toHaveLength(2);
    expect(messages[0].startsWith("Positioning failed: EISDIR")).toBe(true);
    expect(messages[1].startsWith("Logging failed: EISDIR")).toBe(true);
  });
});
