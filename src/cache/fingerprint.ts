/**
 * Tiergate: Cache Hierarchy: Input Fingerprints
 */

import { createHash } from "node:crypto";

export const DEFAULT_FINGERPRINT_LENGTH = 4096;

/**
 * Canonical form used for cache keys: NFC, LF line endings, no trailing
 * whitespace on any line, no leading or trailing blank space overall.
 */
export function normalizeInput(text: string): string {
  return text
    .normalize("NFC")
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+$/gm, "")
    .trim();
}

/**
 * sha-256 of the normalized input. Inputs longer than `maxLength` hash only
 * their head, their raw length and a tail sample of `maxLength / 4`
 * characters, so the cost stays bounded on very large inputs.
 */
export function fingerprint(
  text: string,
  maxLength: number = DEFAULT_FINGERPRINT_LENGTH,
): string {
  const hash = createHash("sha256");

  if (text.length <= maxLength) {
    hash.update(normalizeInput(text));
    return hash.digest("hex");
  }

  const tailLength = Math.max(1, Math.floor(maxLength / 4));
  hash.update(normalizeInput(text.slice(0, maxLength)));
  hash.update(`\u0000${text.length}\u0000`);
  hash.update(normalizeInput(text.slice(-tailLength)));
  return hash.digest("hex");
}
