import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import { DEFAULT_OUTPUT_PATH, parseScrapeArgs, USAGE } from "./args";

describe("parseScrapeArgs", () => {
  it("fills in defaults", () => {
    expect(parseScrapeArgs(["apns.csv"])).toEqual({
      kind: "run",
      options: {
        inputFile: "apns.csv",
        output: DEFAULT_OUTPUT_PATH,
        column: "APN",
        batchSize: 50,
        stream: true,
        quiet: false,
      },
    });
  });

  it("reads short, long and inline options", () => {
    expect(
      parseScrapeArgs([
        "-o",
        "out/results.csv",
        "apns.csv",
        "--column=parcel",
        "--batch-size",
        "100",
        "--no-stream",
        "--delay=500",
        "--quiet",
      ])
    ).toEqual({
      kind: "run",
      options: {
        inputFile: "apns.csv",
        output: "out/results.csv",
        column: "parcel",
        batchSize: 100,
        stream: false,
        delayMs: 500,
        quiet: true,
      },
    });
  });

  it("asks for help", () => {
    expect(parseScrapeArgs(["apns.csv", "--help"])).toEqual({ kind: "help" });
  });

  it("requires an input file", () => {
    expect(parseScrapeArgs([])).toEqual({
      kind: "error",
      message: "inputFile: Input CSV file is required",
    });
  });

  it("rejects unknown options and missing values", () => {
    expect(parseScrapeArgs(["apns.csv", "--fast"])).toEqual({
      kind: "error",
      message: "Unknown option: --fast",
    });
    expect(parseScrapeArgs(["apns.csv", "-o"])).toEqual({
      kind: "error",
      message: "Option -o expects a value",
    });
  });

  it("rejects a non-numeric batch size", () => {
    expect(parseScrapeArgs(["apns.csv", "--batch-size", "many"])).toMatchObject({
      kind: "error",
      message: expect.stringMatching(/^batchSize: /),
    });
  });

  it("rejects a second input file", () => {
    expect(parseScrapeArgs(["a.csv", "b.csv"])).toEqual({
      kind: "error",
      message: "Unexpected argument: b.csv",
    });
  });
});

describe("CLI entry point", () => {
  it("is launched through the tsx npm script", () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL("../../../package.json", import.meta.url), "utf-8")
    );

    expect(manifest).not.toHaveProperty("bin");
    expect(manifest).toHaveProperty("scripts.scrape", "tsx scripts/scrape-parcels.ts");
    expect(USAGE.split("\n")[0]).toBe("Usage: npm run scrape -- <input.csv> [options]");
  });
});
