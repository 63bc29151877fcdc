/**
 * Hashing Utilities
 */

import { createHash } from "crypto";

/**
 * Compute SHA256 hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Compute a DOM signature hash from the element ids present on a page.
 * Used to notice when the detail page structure changes.
 */
export function computeDomSignature(elementIds: string[]): string {
  return sha256([...elementIds].sort().join("|"));
}
