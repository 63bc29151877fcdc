/**
 * Detail page resolution
 *
 * After the search form is posted the portal reaches ParcelDetail.aspx in
 * one of several ways. Each mechanism is an independent matcher; the chain
 * tries them in order and the first non-"no-match" outcome wins.
 */

import type { CheerioAPI } from "cheerio";
import { AUTO_SUBMIT_FORM_ID, FAILURE_PHRASES } from "./constants";

// ============================================================================
// Types
// ============================================================================

export interface ResolutionContext {
  /** URL of the last response after redirects */
  finalUrl: string;
  $: CheerioAPI;
  baseUrl: string;
  detailPath: string;
}

export type ResolutionOutcome =
  | { kind: "resolved"; url: string }
  | { kind: "absent"; reason: string }
  | { kind: "no-match" };

/** Chain result, tagged with the matcher that produced it */
export type ChainOutcome =
  | (Extract<ResolutionOutcome, { kind: "resolved" | "absent" }> & { via: string })
  | { kind: "no-match" };

export interface DetailPageMatcher {
  name: string;
  match(ctx: ResolutionContext): ResolutionOutcome;
}

const NO_MATCH: ResolutionOutcome = { kind: "no-match" };

const SCRIPT_REDIRECT_PATTERN = /location\.href\s*=\s*["']([^"']+)["']/;

function resolveAgainstBase(target: string, baseUrl: string): string {
  return new URL(target, baseUrl).toString();
}

// ============================================================================
// Matchers
// ============================================================================

export const directUrlMatcher: DetailPageMatcher = {
  name: "redirect",
  match(ctx) {
    return ctx.finalUrl.includes(ctx.detailPath)
      ? { kind: "resolved", url: ctx.finalUrl }
      : NO_MATCH;
  },
};

export const scriptRedirectMatcher: DetailPageMatcher = {
  name: "script",
  match(ctx) {
    for (const script of ctx.$("script").toArray()) {
      const source = ctx.$(script).text();
      if (!source.includes("location.href")) continue;

      const target = source.match(SCRIPT_REDIRECT_PATTERN)?.[1];
      if (target) {
        return { kind: "resolved", url: resolveAgainstBase(target, ctx.baseUrl) };
      }
    }
    return NO_MATCH;
  },
};

export const autoSubmitFormMatcher: DetailPageMatcher = {
  name: "form",
  match(ctx) {
    const forms = [
      ...ctx.$(`form#${AUTO_SUBMIT_FORM_ID}`).toArray(),
      ...ctx.$("form").not(`#${AUTO_SUBMIT_FORM_ID}`).toArray(),
    ];

    for (const form of forms) {
      const action = ctx.$(form).attr("action");
      if (action && action.includes(ctx.detailPath)) {
        return { kind: "resolved", url: resolveAgainstBase(action, ctx.baseUrl) };
      }
    }
    return NO_MATCH;
  },
};

export const failurePhraseMatcher: DetailPageMatcher = {
  name: "failure-phrase",
  match(ctx) {
    const message = findFailureText(ctx.$);
    return message ? { kind: "absent", reason: message } : NO_MATCH;
  },
};

export const DETAIL_PAGE_MATCHERS: readonly DetailPageMatcher[] = [
  directUrlMatcher,
  scriptRedirectMatcher,
  autoSubmitFormMatcher,
  failurePhraseMatcher,
];

// ============================================================================
// Chain
// ============================================================================

export function resolveDetailPage(
  ctx: ResolutionContext,
  matchers: readonly DetailPageMatcher[] = DETAIL_PAGE_MATCHERS
): ChainOutcome {
  for (const matcher of matchers) {
    const outcome = matcher.match(ctx);
    if (outcome.kind !== "no-match") {
      return { ...outcome, via: matcher.name };
    }
  }
  return { kind: "no-match" };
}

/**
 * First visible text node mentioning a known failure phrase, trimmed.
 */
export function findFailureText($: CheerioAPI): string | undefined {
  const textNodes = $("*")
    .not("script, style, noscript, head, title")
    .contents()
    .toArray();

  for (const node of textNodes) {
    if (node.nodeType !== 3) continue;

    const text = node.data.trim();
    const lower = text.toLowerCase();
    if (text && FAILURE_PHRASES.some((phrase) => lower.includes(phrase))) {
      return text;
    }
  }
  return undefined;
}
