import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as cheerio from "cheerio";
import { createClarkAssessorAdapter } from "./adapter";
import { CLARK_ASSESSOR_CONFIG, PARSER_VERSION } from "./constants";
import type { ParcelIngestionContext } from "../../adapters/types";
import { ConsoleObserver } from "../../observability";
import { computeDomSignature, sha256 } from "../../utils/hash";
import { createFakeTransport, loadFixture, noSleep } from "../../testing/fake-transport";

const DETAIL_URL = `${CLARK_ASSESSOR_CONFIG.baseUrl}ParcelDetail.aspx?hdnParcel=177-13-420-002`;

function context(observer: ConsoleObserver): ParcelIngestionContext {
  return {
    runId: "run-test",
    now: () => 0,
    timestamp: () => "2025-02-26T00:00:00.000Z",
    observer,
  };
}

describe("ClarkAssessorAdapter", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the source config by default", () => {
    const adapter = createClarkAssessorAdapter();
    expect(adapter.key).toBe("nv-clark-assessor");
    expect(adapter.config).toBe(CLARK_ASSESSOR_CONFIG);
    adapter.close();
  });

  it("fetches the detail page and fingerprints its body", async () => {
    const html = loadFixture("residential-two-owners.html");
    const transport = createFakeTransport(() => ({ body: html }));
    const adapter = createClarkAssessorAdapter({
      client: { adapter: transport.adapter, sleep: noSleep },
    });

    const result = await adapter.fetch({ detailUrl: DETAIL_URL }, context(new ConsoleObserver()));

    expect(result).toMatchObject({
      ok: true,
      url: DETAIL_URL,
      fetchedAt: "2025-02-26T00:00:00.000Z",
      bodySha256: sha256(html),
    });
    adapter.close();
  });

  it("signs the page by the field elements it contains", async () => {
    const adapter = createClarkAssessorAdapter();
    const observer = new ConsoleObserver({ verbose: false });
    const document = cheerio.load(
      '<span id="lblOwner1">SMITH JOHN</span><span id="lblTown">ENTERPRISE</span>'
    );

    const result = await adapter.extract(
      { document, parcelId: "177-13-420-002", detailUrl: DETAIL_URL },
      context(observer)
    );

    expect(result.parserVersion).toBe(PARSER_VERSION);
    expect(result.domSignature).toBe(computeDomSignature(["lblOwner1", "lblTown"]));
    expect(result.record.detailUrl).toBe(DETAIL_URL);
    expect(result.record.status).toBe("Success");
    expect(observer.getMetrics().counters['step.ok:{"step":"extract"}']).toBe(1);
    adapter.close();
  });

  it("passes resolve warnings to the observer", async () => {
    const transport = createFakeTransport((request) => {
      if (request.method === "GET" && request.url.endsWith("pcl.aspx")) {
        return { body: "<html><body><form></form></body></html>" };
      }
      return { body: loadFixture("not-found.html") };
    });
    const adapter = createClarkAssessorAdapter({
      client: { adapter: transport.adapter, sleep: noSleep },
    });
    const observer = new ConsoleObserver({ verbose: false });

    const result = await adapter.resolve({ parcelId: "999-99-999-999" }, context(observer));

    expect(result).toEqual({
      found: false,
      reason: "not_found",
      message: "Parcel Not Found",
      warnings: [
        "Search page for APN 999-99-999-999 is missing __VIEWSTATE, __VIEWSTATEGENERATOR, __EVENTVALIDATION",
      ],
    });
    expect(observer.getMetrics().warnings).toBe(1);
    adapter.close();
  });
});
