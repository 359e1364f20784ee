import { describe, expect, it } from "vitest";
import {
  DEFAULT_OUT_PATH,
  LIST_URL,
  REQUEST_TIMEOUT_MS,
  USER_AGENT,
  datasetPathFromEnv,
  loadScrapeConfig,
  parseScrapeArgs,
} from "../../scripts/config";

describe("parseScrapeArgs", () => {
  it("returns defaults for an empty argv", () => {
    expect(parseScrapeArgs([])).toEqual({ help: false });
  });

  it("accepts both --flag value and --flag=value", () => {
    expect(parseScrapeArgs(["--out", "data/h.csv", "--workers=4", "--delay", "0.5"])).toEqual({
      help: false,
      outPath: "data/h.csv",
      workers: 4,
      delaySeconds: 0.5,
    });
  });

  it("recognises --help and -h", () => {
    expect(parseScrapeArgs(["--help"]).help).toBe(true);
    expect(parseScrapeArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseScrapeArgs(["--verbose"])).toThrow("Unknown option: --verbose");
  });

  it("rejects a flag followed by another flag", () => {
    expect(() => parseScrapeArgs(["--workers", "--out", "x.csv"])).toThrow(
      "Missing value for --workers"
    );
  });

  it("rejects a trailing flag and an empty --out", () => {
    expect(() => parseScrapeArgs(["--delay"])).toThrow("Missing value for --delay");
    expect(() => parseScrapeArgs(["--out="])).toThrow("Missing value for --out");
  });

  it("requires a positive integer worker count", () => {
    expect(() => parseScrapeArgs(["--workers", "0"])).toThrow(
      'Invalid --workers value: "0" (expected a positive integer)'
    );
    expect(() => parseScrapeArgs(["--workers=2.5"])).toThrow(
      'Invalid --workers value: "2.5" (expected a positive integer)'
    );
  });

  it("requires a non-negative delay", () => {
    expect(() => parseScrapeArgs(["--delay", "-1"])).toThrow(
      'Invalid --delay value: "-1" (expected a non-negative number)'
    );
    expect(() => parseScrapeArgs(["--delay=soon"])).toThrow(
      'Invalid --delay value: "soon" (expected a non-negative number)'
    );
    expect(parseScrapeArgs(["--delay", "0"]).delaySeconds).toBe(0);
  });
});

describe("datasetPathFromEnv", () => {
  it("falls back to the default file name", () => {
    expect(datasetPathFromEnv({})).toBe(DEFAULT_OUT_PATH);
    expect(datasetPathFromEnv({ HOSPITALS_CSV: "   " })).toBe(DEFAULT_OUT_PATH);
  });

  it("uses HOSPITALS_CSV, trimmed", () => {
    expect(datasetPathFromEnv({ HOSPITALS_CSV: " data/h.csv " })).toBe("data/h.csv");
  });
});

describe("loadScrapeConfig", () => {
  it("applies the documented defaults", () => {
    expect(loadScrapeConfig({ help: false }, {})).toEqual({
      listUrl: LIST_URL,
      outPath: "bc_hospitals_from_wikipedia.csv",
      workers: 10,
      delayMs: 0,
      timeoutMs: REQUEST_TIMEOUT_MS,
      userAgent: USER_AGENT,
    });
  });

  it("prefers command-line values over the environment", () => {
    const config = loadScrapeConfig(
      { help: false, outPath: "cli.csv", workers: 3, delaySeconds: 0.25 },
      {
        HOSPITALS_CSV: "env.csv",
        HOSPITALS_LIST_URL: "https://example.org/list",
        HOSPITALS_USER_AGENT: "test-agent",
        HOSPITALS_TIMEOUT_MS: "5000",
      }
    );

    expect(config).toEqual({
      listUrl: "https://example.org/list",
      outPath: "cli.csv",
      workers: 3,
      delayMs: 250,
      timeoutMs: 5000,
      userAgent: "test-agent",
    });
  });

  it("rejects a malformed timeout", () => {
    expect(() => loadScrapeConfig({ help: false }, { HOSPITALS_TIMEOUT_MS: "abc" })).toThrow(
      'Invalid HOSPITALS_TIMEOUT_MS value: "abc" (expected a positive integer)'
    );
  });
});
