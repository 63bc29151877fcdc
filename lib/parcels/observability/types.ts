/**
 * Parcel Scrape Observability Types
 */

import type { ScrapeStatus } from "../types";

/** "output" covers the batch runner handing a record to its caller */
export type ScrapeStep = "resolve" | "fetch" | "extract" | "output";

export interface ParcelIngestionObserver {
  onRunStart(meta: { runId: string; sourceKey: string; apn: string }): void;
  onStepStart(meta: { runId: string; step: ScrapeStep }): void;
  onStepEnd(meta: {
    runId: string;
    step: ScrapeStep;
    ok: boolean;
    durationMs: number;
    data?: Record<string, unknown>;
  }): void;
  onWarning(meta: { runId: string; step: ScrapeStep; message: string }): void;
  onRunEnd(meta: {
    runId: string;
    status: ScrapeStatus;
    durationMs: number;
    error?: string;
  }): void;
  increment(name: string, by?: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

/** Running aggregate for one timing key */
export interface TimingSummary {
  count: number;
  totalMs: number;
  maxMs: number;
}

export interface ObserverMetrics {
  counters: Record<string, number>;
  timings: Record<string, TimingSummary>;
  warnings: number;
}
