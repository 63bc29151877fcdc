#!/usr/bin/env tsx
/**
 * Clark County Parcel Scraper CLI
 *
 * Reads APNs from a CSV file, scrapes each parcel's assessor detail page,
 * and writes the results to an output CSV.
 *
 * Usage:
 *   npm run scrape -- data/input/apns.csv
 *   npm run scrape -- data/input/apns.csv -o data/output/results.csv --no-stream --batch-size 100
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { existsSync } from "fs";
import { parseScrapeArgs, USAGE, type ScrapeCliOptions } from "../lib/parcels/cli/args";
import { loadAssessorConfig } from "../lib/parcels/config/env";
import {
  appendRecordToCsv,
  appendRecordsToCsv,
  readParcelIdsFromCsv,
  writeRecordsToCsv,
} from "../lib/parcels/export";
import { scrapeParcelBatch } from "../lib/parcels/ingestion";
import { createConsoleObserver } from "../lib/parcels/observability";
import { createClarkAssessorAdapter } from "../lib/parcels/sources/clark-assessor";
import type { PropertyRecord } from "../lib/parcels/types";

async function run(options: ScrapeCliOptions): Promise<number> {
  if (!existsSync(options.inputFile)) {
    console.error(`Error: Input file '${options.inputFile}' not found`);
    return 1;
  }

  const ids = await readParcelIdsFromCsv(options.inputFile, options.column);
  if (ids.length === 0) {
    console.error("[Scraper] No APNs found in input file");
    return 1;
  }

  const runtime = loadAssessorConfig();
  const adapter = createClarkAssessorAdapter({ config: runtime.source });
  const observer = createConsoleObserver({ verbose: !options.quiet });

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("[Scraper] Interrupt received; stopping after the current APN");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  // Batch mode overwrites the output once, then appends
  const pending: Array<Readonly<PropertyRecord>> = [];
  let wroteBatch = false;
  const flush = async () => {
    if (pending.length === 0) return;
    if (wroteBatch) {
      await appendRecordsToCsv(pending, options.output);
    } else {
      await writeRecordsToCsv(pending, options.output);
      wroteBatch = true;
    }
    pending.length = 0;
  };

  try {
    const { stats } = await scrapeParcelBatch(ids, {
      adapter,
      observer,
      delayMs: options.delayMs ?? runtime.requestDelayMs,
      signal: controller.signal,
      onRecord: async ({ record }) => {
        if (options.stream) {
          await appendRecordToCsv(record, options.output);
          return;
        }
        pending.push(record);
        if (pending.length >= options.batchSize) {
          await flush();
        }
      },
    });

    await flush();

    console.log("[Scraper] Scraping completed!");
    console.log(`[Scraper] Total time: ${(stats.totalMs / 60000).toFixed(2)} minutes`);
    console.log(`[Scraper] Average time per APN: ${(stats.averageMs / 1000).toFixed(2)} seconds`);
    console.log(`[Scraper] Successful: ${stats.successful}`);
    console.log(`[Scraper] Failed: ${stats.failed}`);
    console.log(`[Scraper] Success rate: ${stats.successRate.toFixed(1)}%`);
    if (stats.outputErrors > 0) {
      console.error(`[Scraper] ${stats.outputErrors} record(s) could not be written to ${options.output}`);
    }
    if (stats.aborted) {
      console.log("[Scraper] Scraping interrupted by user");
    }
    console.log(`[Scraper] Results written to ${options.output}`);
    return stats.outputErrors > 0 ? 1 : 0;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

async function main(): Promise<void> {
  const parsed = parseScrapeArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    console.log(USAGE);
    return;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}\n\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  process.exitCode = await run(parsed.options);
}

main().catch((error) => {
  console.error("[Scraper] Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
