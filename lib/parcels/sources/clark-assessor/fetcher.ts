/**
 * Clark County Assessor Session Fetcher
 *
 * Turns an APN into the parsed ParcelDetail.aspx document:
 *   GET pcl.aspx (anti-forgery tokens) → POST search → resolve detail URL → GET detail
 *
 * Every fault is returned as a failure value; nothing here throws.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { SourceConfig } from "../../types";
import {
  SessionClient,
  SessionRequestError,
  type SessionClientOptions,
} from "../../http/session-client";
import {
  ANTI_FORGERY_FIELDS,
  CLARK_ASSESSOR_CONFIG,
  SEARCH_FORM_FIELDS,
  SEARCH_FORM_VALUES,
  type AntiForgeryField,
} from "./constants";
import { resolveDetailPage, DETAIL_PAGE_MATCHERS, type DetailPageMatcher } from "./detail-resolution";

// ============================================================================
// Types
// ============================================================================

export type FetchFailureReason = "network" | "not_found" | "no_detail_page" | "parse";

export interface FetchFailure {
  ok: false;
  reason: FetchFailureReason;
  message: string;
  warnings: string[];
}

export interface DetailUrlResolved {
  ok: true;
  detailUrl: string;
  via: string;
  warnings: string[];
}

export interface DetailDocument {
  ok: true;
  document: CheerioAPI;
  html: string;
  url: string;
  warnings: string[];
}

export type DetailUrlOutcome = DetailUrlResolved | FetchFailure;
export type FetchOutcome = DetailDocument | FetchFailure;

export type AntiForgeryTokens = Partial<Record<AntiForgeryField, string>>;

export interface AssessorFetcherOptions {
  config?: SourceConfig;
  matchers?: readonly DetailPageMatcher[];
  client?: Pick<SessionClientOptions, "adapter" | "sleep" | "headers" | "maxRedirects">;
}

// ============================================================================
// Helpers
// ============================================================================

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Transport faults are network failures; anything else came from reading the page */
function classifyError(error: unknown): "network" | "parse" {
  return error instanceof SessionRequestError ? "network" : "parse";
}

/**
 * Read the ASP.NET hidden fields from the search page.
 */
export function extractAntiForgeryTokens($: CheerioAPI): AntiForgeryTokens {
  const tokens: AntiForgeryTokens = {};
  for (const field of ANTI_FORGERY_FIELDS) {
    const input = $(`input[name="${field}"]`).first();
    if (input.length) {
      tokens[field] = input.attr("value") ?? "";
    }
  }
  return tokens;
}

export function buildSearchForm(apn: string, tokens: AntiForgeryTokens): Record<string, string> {
  const form: Record<string, string> = {};
  for (const field of ANTI_FORGERY_FIELDS) {
    const value = tokens[field];
    if (value !== undefined) {
      form[field] = value;
    }
  }

  form[SEARCH_FORM_FIELDS.parcel] = apn;
  form[SEARCH_FORM_FIELDS.submit] = SEARCH_FORM_VALUES.submit;
  form[SEARCH_FORM_FIELDS.searchType] = SEARCH_FORM_VALUES.searchType;
  return form;
}

// ============================================================================
// Fetcher
// ============================================================================

export class ClarkAssessorFetcher {
  readonly config: SourceConfig;
  readonly searchUrl: string;
  private readonly session: SessionClient;
  private readonly matchers: readonly DetailPageMatcher[];

  constructor(options: AssessorFetcherOptions = {}) {
    this.config = options.config ?? CLARK_ASSESSOR_CONFIG;
    this.searchUrl = new URL(this.config.searchPath, this.config.baseUrl).toString();
    this.matchers = options.matchers ?? DETAIL_PAGE_MATCHERS;
    this.session = new SessionClient({
      timeoutMs: this.config.timeoutMs,
      verifySsl: this.config.verifySsl,
      retry: this.config.retry,
      pool: this.config.pool,
      ...options.client,
    });
  }

  /**
   * Steps 1-3: fetch tokens, post the search, work out the detail URL.
   */
  async resolveDetailUrl(apn: string): Promise<DetailUrlOutcome> {
    const warnings: string[] = [];

    try {
      const searchPage = await this.session.get(this.searchUrl);
      const tokens = extractAntiForgeryTokens(cheerio.load(searchPage.body));

      const missing = ANTI_FORGERY_FIELDS.filter((field) => tokens[field] === undefined);
      if (missing.length > 0) {
        const warning = `Search page for APN ${apn} is missing ${missing.join(", ")}`;
        console.warn(`[ClarkAssessor] ${warning}`);
        warnings.push(warning);
      }

      const response = await this.session.postForm(this.searchUrl, buildSearchForm(apn, tokens));

      const outcome = resolveDetailPage(
        {
          finalUrl: response.url,
          $: cheerio.load(response.body),
          baseUrl: this.config.baseUrl,
          detailPath: this.config.detailPath,
        },
        this.matchers
      );

      if (outcome.kind === "resolved") {
        return { ok: true, detailUrl: outcome.url, via: outcome.via, warnings };
      }

      if (outcome.kind === "absent") {
        console.warn(`[ClarkAssessor] Search returned error for APN ${apn}: ${outcome.reason}`);
        return { ok: false, reason: "not_found", message: outcome.reason, warnings };
      }

      console.warn(`[ClarkAssessor] No detail page found for APN ${apn} - may be invalid APN`);
      return { ok: false, reason: "no_detail_page", message: "No detail page found", warnings };
    } catch (error) {
      const message = describeError(error);
      const reason = classifyError(error);
      if (reason === "network") {
        console.error(`[ClarkAssessor] Network error getting detail URL for APN ${apn}: ${message}`);
      } else {
        console.error(`[ClarkAssessor] Could not read search response for APN ${apn}: ${message}`);
      }
      return { ok: false, reason, message, warnings };
    }
  }

  /**
   * Step 4: fetch and parse the detail page.
   */
  async fetchDetailDocument(detailUrl: string): Promise<FetchOutcome> {
    let html: string;
    let url: string;

    try {
      const response = await this.session.get(detailUrl);
      html = response.body;
      url = response.url;
    } catch (error) {
      const message = describeError(error);
      const reason = classifyError(error);
      if (reason === "network") {
        console.error(`[ClarkAssessor] Network error fetching property page ${detailUrl}: ${message}`);
      } else {
        console.error(`[ClarkAssessor] Could not follow property page ${detailUrl}: ${message}`);
      }
      return { ok: false, reason, message, warnings: [] };
    }

    try {
      return { ok: true, document: cheerio.load(html), html, url, warnings: [] };
    } catch (error) {
      const message = describeError(error);
      console.error(`[ClarkAssessor] Could not parse property page ${detailUrl}: ${message}`);
      return { ok: false, reason: "parse", message, warnings: [] };
    }
  }

  /**
   * Resolve an APN all the way to its parsed detail document.
   */
  async resolveDetailDocument(apn: string): Promise<FetchOutcome> {
    const started = Date.now();
    const resolved = await this.resolveDetailUrl(apn);
    if (!resolved.ok) {
      return resolved;
    }

    const fetched = await this.fetchDetailDocument(resolved.detailUrl);
    if (!fetched.ok) {
      return { ...fetched, warnings: [...resolved.warnings, ...fetched.warnings] };
    }

    console.log(`[ClarkAssessor] Fetched APN ${apn} in ${((Date.now() - started) / 1000).toFixed(2)} seconds`);
    return { ...fetched, warnings: resolved.warnings };
  }

  /**
   * Release the connection pool. The fetcher cannot be used afterwards.
   */
  close(): void {
    this.session.close();
  }
}
