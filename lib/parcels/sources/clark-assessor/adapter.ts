/**
 * Clark County Assessor Adapter
 *
 * Wraps the session fetcher and field extractor to implement the
 * ParcelSourceAdapter interface, reporting each phase to the observer.
 */

import type {
  ParcelSourceAdapter,
  ParcelIngestionContext,
  ParcelResolveInput,
  ParcelResolveResult,
  ParcelFetchInput,
  ParcelFetchResult,
  ParcelExtractInput,
  ParcelExtractResult,
} from "../../adapters/types";
import { computeDomSignature, sha256 } from "../../utils/hash";
import { ClarkAssessorFetcher, type AssessorFetcherOptions } from "./fetcher";
import { extractPropertyRecord } from "./extract";
import {
  ASSESSOR_FIELD_ELEMENTS,
  CLARK_ASSESSOR_SOURCE_KEY,
  PARSER_VERSION,
} from "./constants";

// ============================================================================
// Adapter Implementation
// ============================================================================

export class ClarkAssessorAdapter implements ParcelSourceAdapter {
  key = CLARK_ASSESSOR_SOURCE_KEY;
  displayName = "Clark County Assessor";
  readonly fetcher: ClarkAssessorFetcher;

  constructor(options: AssessorFetcherOptions = {}) {
    this.fetcher = new ClarkAssessorFetcher(options);
  }

  get config() {
    return this.fetcher.config;
  }

  /**
   * Resolve: submit the search form and follow it to the detail URL
   */
  async resolve(
    input: ParcelResolveInput,
    ctx: ParcelIngestionContext
  ): Promise<ParcelResolveResult> {
    const stepStart = ctx.now();
    ctx.observer?.onStepStart({ runId: ctx.runId, step: "resolve" });

    const outcome = await this.fetcher.resolveDetailUrl(input.parcelId);

    for (const message of outcome.warnings) {
      ctx.observer?.onWarning({ runId: ctx.runId, step: "resolve", message });
    }

    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step: "resolve",
      ok: outcome.ok,
      durationMs: ctx.now() - stepStart,
      data: outcome.ok
        ? { detailUrl: outcome.detailUrl, via: outcome.via }
        : { reason: outcome.reason, message: outcome.message },
    });

    if (!outcome.ok) {
      return {
        found: false,
        reason: outcome.reason,
        message: outcome.message,
        warnings: outcome.warnings,
      };
    }

    return {
      found: true,
      detailUrl: outcome.detailUrl,
      via: outcome.via,
      warnings: outcome.warnings,
    };
  }

  /**
   * Fetch: GET and parse ParcelDetail.aspx
   */
  async fetch(input: ParcelFetchInput, ctx: ParcelIngestionContext): Promise<ParcelFetchResult> {
    const stepStart = ctx.now();
    ctx.observer?.onStepStart({ runId: ctx.runId, step: "fetch" });

    const outcome = await this.fetcher.fetchDetailDocument(input.detailUrl);
    const durationMs = ctx.now() - stepStart;

    if (!outcome.ok) {
      ctx.observer?.onStepEnd({
        runId: ctx.runId,
        step: "fetch",
        ok: false,
        durationMs,
        data: { reason: outcome.reason, message: outcome.message },
      });
      return { ok: false, reason: outcome.reason, message: outcome.message };
    }

    const bodySha256 = sha256(outcome.html);
    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step: "fetch",
      ok: true,
      durationMs,
      data: { bodySha256, bytes: outcome.html.length },
    });

    return {
      ok: true,
      document: outcome.document,
      url: outcome.url,
      fetchedAt: ctx.timestamp(),
      bodySha256,
    };
  }

  /**
   * Extract: map the detail page into a PropertyRecord
   */
  async extract(
    input: ParcelExtractInput,
    ctx: ParcelIngestionContext
  ): Promise<ParcelExtractResult> {
    const stepStart = ctx.now();
    ctx.observer?.onStepStart({ runId: ctx.runId, step: "extract" });

    const $ = input.document;
    const presentIds = Object.values(ASSESSOR_FIELD_ELEMENTS).filter(
      (id) => $(`[id="${id}"]`).length > 0
    );
    const domSignature = computeDomSignature(presentIds);

    const record = extractPropertyRecord($, input.parcelId, { observer: ctx.observer });
    record.detailUrl = input.detailUrl;

    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step: "extract",
      ok: record.status === "Success",
      durationMs: ctx.now() - stepStart,
      data: { status: record.statusMessage, elementsFound: presentIds.length },
    });

    return {
      record,
      parserVersion: PARSER_VERSION,
      domSignature,
    };
  }

  close(): void {
    this.fetcher.close();
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createClarkAssessorAdapter(options?: AssessorFetcherOptions): ClarkAssessorAdapter {
  return new ClarkAssessorAdapter(options);
}
