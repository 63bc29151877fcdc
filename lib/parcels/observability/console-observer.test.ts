import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleObserver } from "./console-observer";

function loggedEvents(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map(([line]) => {
    const parsed: unknown = JSON.parse(String(line));
    return typeof parsed === "object" && parsed !== null && "event" in parsed
      ? String(parsed.event)
      : "";
  });
}

describe("ConsoleObserver", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs one JSON line per event", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const observer = new ConsoleObserver();

    observer.onRunStart({ runId: "run-1", sourceKey: "nv-clark-assessor", apn: "177-13-420-002" });
    observer.onStepStart({ runId: "run-1", step: "resolve" });
    observer.onStepEnd({ runId: "run-1", step: "resolve", ok: true, durationMs: 12 });
    observer.onRunEnd({ runId: "run-1", status: "Success", durationMs: 40 });

    expect(loggedEvents(log)).toEqual([
      "parcel_scrape_run_start",
      "parcel_scrape_step_start",
      "parcel_scrape_step_end",
      "parcel_scrape_run_end",
    ]);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      runId: "run-1",
      sourceKey: "nv-clark-assessor",
      apn: "177-13-420-002",
    });
  });

  it("omits step lines when not verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const observer = new ConsoleObserver({ verbose: false });

    observer.onStepStart({ runId: "run-1", step: "fetch" });
    observer.onStepEnd({ runId: "run-1", step: "fetch", ok: false, durationMs: 5 });
    observer.onRunEnd({ runId: "run-1", status: "Error", durationMs: 6, error: "Failed to fetch page" });

    expect(loggedEvents(log)).toEqual(["parcel_scrape_run_end"]);
    expect(observer.getMetrics().counters['step.failed:{"step":"fetch"}']).toBe(1);
  });

  it("sends warnings to stderr and counts them", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const observer = new ConsoleObserver();

    observer.onWarning({ runId: "run-1", step: "resolve", message: "missing __EVENTVALIDATION" });

    expect(loggedEvents(warn)).toEqual(["parcel_scrape_warning"]);
    expect(observer.getMetrics().warnings).toBe(1);
  });

  it("accumulates counters and timings", () => {
    const observer = new ConsoleObserver();

    observer.increment("extract.field", 1, { field: "owner" });
    observer.increment("extract.field", 2, { field: "owner" });
    observer.timing("step.fetch", 10);
    observer.timing("step.fetch", 30);

    const metrics = observer.getMetrics();
    expect(metrics.counters['extract.field:{"field":"owner"}']).toBe(3);
    expect(metrics.timings["step.fetch"]).toEqual({ count: 2, totalMs: 40, maxMs: 30 });
  });

  it("keeps timing memory flat over long runs", () => {
    const observer = new ConsoleObserver();

    for (let i = 1; i <= 10_000; i++) {
      observer.timing("step.fetch", i % 100);
    }

    const metrics = observer.getMetrics();
    expect(metrics.timings["step.fetch"]).toEqual({ count: 10_000, totalMs: 495_000, maxMs: 99 });

    metrics.timings["step.fetch"].count = 0;
    expect(observer.getMetrics().timings["step.fetch"].count).toBe(10_000);
  });
});
