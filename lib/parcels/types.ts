/**
 * Parcel Scraper Types
 *
 * Core type definitions shared across the scrape-and-extract pipeline.
 */

// ============================================================================
// Source Keys
// ============================================================================

export type ParcelSourceKey = "nv-clark-assessor";

// ============================================================================
// Scrape Status
// ============================================================================

export type ScrapeStatus = "Pending" | "Success" | "Error";

// ============================================================================
// Property Record (Platform Contract)
// ============================================================================

export interface PropertyRecord {
  // Identity
  apn: string;
  parcelNumber?: string;

  // Owner
  owner?: string;
  owner2?: string;

  // Mailing address, one entry per source line
  mailingAddressLine1?: string;
  mailingAddressLine2?: string;
  mailingAddressLine3?: string;
  mailingAddressLine4?: string;
  mailingAddressLine5?: string;

  // Situs
  locationAddress?: string;
  cityUnincorporatedTown?: string;

  // Assessor legal description
  assessorDescriptionLine1?: string;
  assessorDescriptionLine2?: string;
  assessorDescriptionLine3?: string;

  // Recording
  recordedDocumentNumber?: string;
  recordedDate?: string;
  recordedDateFormatted?: string;
  vesting?: string;
  comments?: string;

  // Processing metadata
  status: ScrapeStatus;
  statusMessage: string;
  errorMessage?: string;
  scrapedAt?: string;
  detailUrl?: string;
}

/** Record fields that are filled from the detail page. */
export type ExtractedField = Exclude<
  keyof PropertyRecord,
  "apn" | "status" | "statusMessage" | "errorMessage" | "scrapedAt" | "detailUrl" | "recordedDateFormatted"
>;

// ============================================================================
// Retry / Transport Config
// ============================================================================

export interface RetryConfig {
  maxRetries: number;
  backoffFactorMs: number;
  statusForcelist: number[];
  allowedMethods: string[];
}

export interface PoolConfig {
  maxSockets: number;
  maxFreeSockets: number;
}

// ============================================================================
// Source Config
// ============================================================================

export interface SourceConfig {
  sourceKey: ParcelSourceKey;
  name: string;
  stateFips: string;
  countyFips?: string;
  sourceType: "county_assessor";
  platformFamily: "aspnet_webforms";
  baseUrl: string;
  searchPath: string;
  detailPath: string;
  timeoutMs: number;
  verifySsl: boolean;
  retry: RetryConfig;
  pool: PoolConfig;
}

// ============================================================================
// Batch Results
// ============================================================================

export interface BatchStats {
  total: number;
  successful: number;
  failed: number;
  successRate: number;
  totalMs: number;
  averageMs: number;
  /** Identifiers whose onRecord callback threw */
  outputErrors: number;
  aborted: boolean;
}

export interface BatchResult {
  records: ReadonlyArray<Readonly<PropertyRecord>>;
  stats: BatchStats;
}

export interface BatchProgress {
  index: number;
  total: number;
  apn: string;
  record: Readonly<PropertyRecord>;
  successful: number;
  failed: number;
  elapsedMs: number;
  etaMs: number;
}
