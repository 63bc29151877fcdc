/**
 * Parcel ID (APN) Utilities
 *
 * Clark County APNs are eleven digits grouped 3-2-3-3,
 * e.g. 177-13-420-002.
 */

const APN_DIGIT_COUNT = 11;
const CANONICAL_APN_PATTERN = /^\d{3}-\d{2}-\d{3}-\d{3}$/;

/**
 * Strip all non-digits.
 */
export function normalizeNumericParcelId(raw: string): string {
  if (!raw) return "";
  return raw.replace(/\D/g, "");
}

/**
 * Format a raw APN into canonical XXX-XX-XXX-XXX form.
 *
 * Input that does not reduce to exactly eleven digits is returned unchanged.
 */
export function formatApn(raw: string): string {
  const digits = normalizeNumericParcelId(raw);
  if (digits.length !== APN_DIGIT_COUNT) {
    return raw;
  }

  return `${digits.slice(0, 3)}-${digits.slice(3, 5)}-${digits.slice(5, 8)}-${digits.slice(8, 11)}`;
}

/**
 * Loose validity check: either eleven digits once separators are dropped,
 * or already in canonical dashed form.
 */
export function isValidApn(raw: string): boolean {
  if (!raw) return false;
  if (normalizeNumericParcelId(raw).length === APN_DIGIT_COUNT) return true;
  return CANONICAL_APN_PATTERN.test(raw.trim());
}

export function isCanonicalApn(value: string): boolean {
  return CANONICAL_APN_PATTERN.test(value);
}
