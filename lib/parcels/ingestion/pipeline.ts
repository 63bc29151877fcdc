/**
 * Parcel Scrape Pipeline
 *
 * Orchestrates one identifier through resolve → fetch → extract, and runs
 * batches of identifiers serially. Faults never escape: every identifier
 * yields exactly one PropertyRecord.
 */

import { randomUUID } from "crypto";
import type { ParcelIngestionContext, ParcelSourceAdapter } from "../adapters/types";
import type { BatchProgress, BatchResult, PropertyRecord } from "../types";
import { createConsoleObserver, type ParcelIngestionObserver } from "../observability";
import { createPropertyRecord, markError } from "../records/property-record";
import { formatApn } from "../utils/parcel-id";

export const FETCH_FAILURE_MESSAGE = "Failed to fetch page";

// ============================================================================
// Pipeline Configuration
// ============================================================================

export interface ScrapeParcelOptions {
  adapter: ParcelSourceAdapter;
  observer?: ParcelIngestionObserver;
}

export interface ScrapeBatchOptions extends ScrapeParcelOptions {
  /** Courtesy pause between identifiers */
  delayMs?: number;
  /** Checked between identifiers; an in-flight identifier always completes */
  signal?: AbortSignal;
  /** Log a progress line every N identifiers */
  progressEvery?: number;
  onRecord?: (progress: BatchProgress) => void | Promise<void>;
  /** Close the adapter once the batch ends (default true) */
  closeAdapter?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Context Factory
// ============================================================================

function createIngestionContext(
  runId: string,
  observer?: ParcelIngestionObserver
): ParcelIngestionContext {
  return {
    runId,
    now: () => Date.now(),
    timestamp: () => new Date().toISOString(),
    observer,
  };
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Single Identifier
// ============================================================================

export async function scrapeParcel(
  apn: string,
  options: ScrapeParcelOptions
): Promise<Readonly<PropertyRecord>> {
  const { adapter } = options;
  const observer = options.observer || createConsoleObserver();
  const runId = randomUUID();
  const runStart = Date.now();
  const ctx = createIngestionContext(runId, observer);

  observer.onRunStart({ runId, sourceKey: adapter.key, apn });

  let record: PropertyRecord;

  try {
    const resolved = await adapter.resolve({ parcelId: apn }, ctx);

    if (!resolved.found) {
      console.error(`[Pipeline] Failed to scrape ${apn}: ${resolved.message}`);
      record = markError(createPropertyRecord(apn), FETCH_FAILURE_MESSAGE);
    } else {
      const fetched = await adapter.fetch({ detailUrl: resolved.detailUrl }, ctx);

      if (!fetched.ok) {
        console.error(`[Pipeline] Failed to scrape ${apn}: ${fetched.message}`);
        record = markError(createPropertyRecord(apn), FETCH_FAILURE_MESSAGE);
      } else {
        const extracted = await adapter.extract(
          { document: fetched.document, parcelId: apn, detailUrl: fetched.url },
          ctx
        );
        record = extracted.record;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.error(`[Pipeline] Unexpected error scraping ${apn}: ${error}`);
    record = markError(createPropertyRecord(apn), error);
  }

  observer.onRunEnd({
    runId,
    status: record.status,
    durationMs: Date.now() - runStart,
    error: record.errorMessage,
  });

  return Object.freeze(record);
}

// ============================================================================
// Batch
// ============================================================================

export async function scrapeParcelBatch(
  identifiers: readonly string[],
  options: ScrapeBatchOptions
): Promise<BatchResult> {
  const observer = options.observer || createConsoleObserver();
  const wait = options.sleep ?? sleep;
  const progressEvery = options.progressEvery ?? 10;
  const delayMs = options.delayMs ?? 0;
  const total = identifiers.length;
  const records: Array<Readonly<PropertyRecord>> = [];
  const batchStart = Date.now();

  let successful = 0;
  let failed = 0;
  let outputErrors = 0;
  let aborted = false;
  const batchId = randomUUID();

  console.log(`[Pipeline] Starting to scrape ${total} properties`);

  try {
    for (let i = 0; i < total; i++) {
      if (options.signal?.aborted) {
        aborted = true;
        console.log(`[Pipeline] Scraping interrupted after ${i}/${total}`);
        break;
      }

      const apn = formatApn(identifiers[i]);
      console.log(`[Pipeline] Processing ${i + 1}/${total}: ${apn}`);

      const record = await scrapeParcel(apn, { adapter: options.adapter, observer });
      records.push(record);

      if (record.status === "Success") {
        successful++;
      } else {
        failed++;
        console.warn(`[Pipeline] Failed to extract data for ${apn}: ${record.statusMessage}`);
      }

      const processed = i + 1;
      const elapsedMs = Date.now() - batchStart;
      const averageMs = elapsedMs / processed;
      const etaMs = averageMs * (total - processed);

      try {
        await options.onRecord?.({
          index: i,
          total,
          apn,
          record,
          successful,
          failed,
          elapsedMs,
          etaMs,
        });
      } catch (err) {
        // A failed write must not stop the remaining identifiers
        const error = err instanceof Error ? err.message : String(err);
        outputErrors++;
        console.error(`[Pipeline] Output callback failed for ${apn}: ${error}`);
        observer.onWarning({
          runId: batchId,
          step: "output",
          message: `Output callback failed for ${apn}: ${error}`,
        });
      }

      if (processed % progressEvery === 0) {
        console.log(
          `[Pipeline] Progress: ${processed}/${total} (${((processed / total) * 100).toFixed(1)}%) - ` +
            `Avg: ${(averageMs / 1000).toFixed(2)}s/APN - ` +
            `Est. remaining: ${(etaMs / 60000).toFixed(1)} min`
        );
      }

      if (delayMs > 0 && processed < total && !options.signal?.aborted) {
        await wait(delayMs);
      }
    }
  } finally {
    if (options.closeAdapter ?? true) {
      options.adapter.close();
    }
  }

  const totalMs = Date.now() - batchStart;
  const processed = records.length;
  const stats = {
    total,
    successful,
    failed,
    successRate: processed > 0 ? (successful / processed) * 100 : 0,
    totalMs,
    averageMs: processed > 0 ? totalMs / processed : 0,
    outputErrors,
    aborted,
  };

  console.log(
    `[Pipeline] Scraping completed: ${successful} successful, ${failed} failed ` +
      `(${stats.successRate.toFixed(1)}% success) in ${(totalMs / 60000).toFixed(2)} min`
  );

  return { records, stats };
}
