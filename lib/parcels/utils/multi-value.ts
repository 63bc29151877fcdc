/**
 * Multi-value field splitting
 *
 * Some detail page labels hold several values separated by <br> tags
 * (e.g. two owners). Splitting happens on the raw markup before re-parsing,
 * so this stays behind a single function that can be swapped for a
 * tree-based splitter later.
 */

import * as cheerio from "cheerio";
import { decodeHTML } from "entities";

const LINE_BREAK_PATTERN = /<br\s*\/?>/i;

// Tag names that survive as text when a fragment is cut mid-tag
const TAG_ARTIFACTS = new Set(["span", "label", "div"]);

export function splitMultiValueField(rawMarkup: string): string[] {
  if (!rawMarkup) return [];

  const values: string[] = [];

  for (const fragment of rawMarkup.split(LINE_BREAK_PATTERN)) {
    const text = cheerio.load(fragment, null, false).root().text().trim();

    if (!text || TAG_ARTIFACTS.has(text.toLowerCase())) {
      continue;
    }

    values.push(decodeHTML(text).trim());
  }

  return values;
}
