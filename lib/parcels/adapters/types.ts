/**
 * Parcel Adapter Interface
 *
 * Defines the contract for source adapters that implement the
 * resolve → fetch → extract pipeline.
 */

import type { CheerioAPI } from "cheerio";
import type { ParcelSourceKey, PropertyRecord, SourceConfig } from "../types";
import type { ParcelIngestionObserver } from "../observability/types";

// ============================================================================
// Ingestion Context
// ============================================================================

export interface ParcelIngestionContext {
  runId: string;
  now(): number; // Performance timing (Date.now())
  timestamp(): string; // ISO timestamp
  observer?: ParcelIngestionObserver;
}

// ============================================================================
// Resolve Phase
// ============================================================================

export interface ParcelResolveInput {
  parcelId: string;
}

export type ParcelResolveResult =
  | { found: true; detailUrl: string; via: string; warnings: string[] }
  | { found: false; reason: string; message: string; warnings: string[] };

// ============================================================================
// Fetch Phase
// ============================================================================

export interface ParcelFetchInput {
  detailUrl: string;
}

export type ParcelFetchResult =
  | {
      ok: true;
      document: CheerioAPI;
      url: string;
      fetchedAt: string;
      bodySha256: string;
    }
  | { ok: false; reason: string; message: string };

// ============================================================================
// Extract Phase
// ============================================================================

export interface ParcelExtractInput {
  document: CheerioAPI;
  parcelId: string;
  detailUrl: string;
}

export interface ParcelExtractResult {
  record: PropertyRecord;
  parserVersion: string;
  domSignature: string;
}

// ============================================================================
// Source Adapter Interface
// ============================================================================

export interface ParcelSourceAdapter {
  /** Unique source key */
  key: ParcelSourceKey;

  /** Human-readable display name */
  displayName: string;

  /** Source configuration */
  config: SourceConfig;

  /**
   * Resolve: Find the detail page URL for a parcel id
   */
  resolve(input: ParcelResolveInput, ctx: ParcelIngestionContext): Promise<ParcelResolveResult>;

  /**
   * Fetch: Retrieve and parse the detail page
   */
  fetch(input: ParcelFetchInput, ctx: ParcelIngestionContext): Promise<ParcelFetchResult>;

  /**
   * Extract: Map the parsed page into a PropertyRecord
   */
  extract(input: ParcelExtractInput, ctx: ParcelIngestionContext): Promise<ParcelExtractResult>;

  /**
   * Release network resources held by the adapter
   */
  close(): void;
}
