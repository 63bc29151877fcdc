#!/usr/bin/env tsx
/**
 * Golden Parcel Test Runner
 *
 * Validates that extraction produces stable records from saved detail pages.
 * Run with: npm run parcel:golden
 */

import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import * as cheerio from "cheerio";

import { extractPropertyRecord } from "../lib/parcels/sources/clark-assessor/extract";
import {
  clarkAssessorGoldenCases,
  validateGoldenCase,
  type GoldenParcelCase,
} from "../lib/parcels/sources/clark-assessor/golden/cases";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const GOLDEN_DIR = resolve(__dirname, "../lib/parcels/sources/clark-assessor/golden");

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

function loadFixture(fixturePath: string): string {
  return readFileSync(resolve(GOLDEN_DIR, fixturePath), "utf-8");
}

async function runGoldenTests(): Promise<void> {
  console.log(`\n${colors.blue}=== Clark Assessor Extraction Golden Tests ===${colors.reset}\n`);

  let passed = 0;
  let failed = 0;
  const allFailures: Array<{ case: GoldenParcelCase; errors: string[] }> = [];

  for (const testCase of clarkAssessorGoldenCases) {
    console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

    try {
      const $ = cheerio.load(loadFixture(testCase.fixturePath));
      const record = extractPropertyRecord($, testCase.apn);
      const result = validateGoldenCase(record, testCase.expect);

      if (result.passed) {
        console.log(`  ${colors.green}✓ PASSED${colors.reset}`);
        passed++;
      } else {
        console.log(`  ${colors.red}✗ FAILED${colors.reset}`);
        result.failures.forEach((f) => {
          console.log(`    ${colors.red}- ${f}${colors.reset}`);
        });
        failed++;
        allFailures.push({ case: testCase, errors: result.failures });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`  ${colors.red}✗ ERROR: ${message}${colors.reset}`);
      failed++;
      allFailures.push({ case: testCase, errors: [message] });
    }
  }

  console.log(`\n${colors.blue}=== Summary ===${colors.reset}`);
  console.log(`  Total: ${passed + failed}`);
  console.log(`  ${colors.green}Passed: ${passed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${failed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => {
        console.log(`    - ${e}`);
      });
    }
    process.exit(1);
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
}

runGoldenTests().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
