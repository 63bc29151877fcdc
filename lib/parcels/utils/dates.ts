/**
 * Recorded date helpers
 */

const MONTH_ABBREVIATIONS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

// "20250226:00938" -> year 2025, month 02, day 26, document sequence 00938
const COMPACT_RECORDED_DATE = /^(\d{4})(\d{2})(\d{2}):\d+$/;

/**
 * Reformat the assessor's compact `YYYYMMDD:NNNNN` recording stamp as
 * `MMM D YYYY` (e.g. "Feb 26 2025").
 *
 * Returns null when the text has another shape or is not a calendar date.
 */
export function parseCompactRecordedDate(text: string): string | null {
  const match = text.trim().match(COMPACT_RECORDED_DATE);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${MONTH_ABBREVIATIONS[month - 1]} ${day} ${year}`;
}

/**
 * Best-effort variant: any text that cannot be reformatted comes back unchanged.
 */
export function formatRecordedDate(text: string): string {
  if (!text) return text;
  return parseCompactRecordedDate(text) ?? text;
}
