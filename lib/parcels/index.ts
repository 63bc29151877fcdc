/**
 * Clark County Parcel Scraper
 *
 * Main entry point for the scrape-and-extract pipeline.
 */

// Core types
export * from "./types";

// Observability
export * from "./observability";

// Adapter contract
export type {
  ParcelIngestionContext,
  ParcelResolveInput,
  ParcelResolveResult,
  ParcelFetchInput,
  ParcelFetchResult,
  ParcelExtractInput,
  ParcelExtractResult,
  ParcelSourceAdapter,
} from "./adapters/types";

// Transport
export * from "./http/session-client";

// Records
export * from "./records/property-record";

// Ingestion pipeline
export * from "./ingestion";

// CSV
export * from "./export";

// Configuration
export * from "./config/env";

// Utils
export * from "./utils/hash";
export * from "./utils/parcel-id";
export * from "./utils/multi-value";
export * from "./utils/dates";

// Sources
export * from "./sources/clark-assessor";
