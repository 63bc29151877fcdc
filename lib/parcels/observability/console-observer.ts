/**
 * Console Observer
 *
 * Default observer implementation that logs one JSON line per scrape
 * event, so batch runs can be grepped or shipped to a log system as-is.
 */

import type { ScrapeStatus } from "../types";
import type { ParcelIngestionObserver, ObserverMetrics, ScrapeStep } from "./types";

export interface ConsoleObserverOptions {
  /** Emit step start/end lines. Run boundaries and warnings are always logged. */
  verbose?: boolean;
}

function metricKey(name: string, tags?: Record<string, string>): string {
  return tags ? `${name}:${JSON.stringify(tags)}` : name;
}

export class ConsoleObserver implements ParcelIngestionObserver {
  private readonly verbose: boolean;
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    warnings: 0,
  };

  constructor(options: ConsoleObserverOptions = {}) {
    this.verbose = options.verbose ?? true;
  }

  onRunStart(meta: { runId: string; sourceKey: string; apn: string }): void {
    this.emit("parcel_scrape_run_start", meta);
  }

  onStepStart(meta: { runId: string; step: ScrapeStep }): void {
    if (this.verbose) {
      this.emit("parcel_scrape_step_start", meta);
    }
  }

  onStepEnd(meta: {
    runId: string;
    step: ScrapeStep;
    ok: boolean;
    durationMs: number;
    data?: Record<string, unknown>;
  }): void {
    this.timing(`step.${meta.step}`, meta.durationMs);
    this.increment(meta.ok ? "step.ok" : "step.failed", 1, { step: meta.step });

    if (this.verbose) {
      this.emit("parcel_scrape_step_end", meta);
    }
  }

  onWarning(meta: { runId: string; step: ScrapeStep; message: string }): void {
    this.metrics.warnings += 1;
    console.warn(
      JSON.stringify({
        event: "parcel_scrape_warning",
        ...meta,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onRunEnd(meta: {
    runId: string;
    status: ScrapeStatus;
    durationMs: number;
    error?: string;
  }): void {
    this.increment("run", 1, { status: meta.status });
    this.timing("run", meta.durationMs);
    this.emit("parcel_scrape_run_end", meta);
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = metricKey(name, tags);
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = metricKey(name, tags);
    const summary = this.metrics.timings[key];
    if (!summary) {
      this.metrics.timings[key] = { count: 1, totalMs: durationMs, maxMs: durationMs };
      return;
    }
    summary.count += 1;
    summary.totalMs += durationMs;
    summary.maxMs = Math.max(summary.maxMs, durationMs);
  }

  getMetrics(): ObserverMetrics {
    return {
      counters: { ...this.metrics.counters },
      timings: Object.fromEntries(
        Object.entries(this.metrics.timings).map(([key, summary]) => [key, { ...summary }])
      ),
      warnings: this.metrics.warnings,
    };
  }

  private emit(event: string, meta: object): void {
    console.log(
      JSON.stringify({
        event,
        ...meta,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(options?: ConsoleObserverOptions): ConsoleObserver {
  return new ConsoleObserver(options);
}
