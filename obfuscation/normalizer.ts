/**
 * Entity text normalization
 *
 * Canonicalizes surface variants of the same value so they group together:
 * "(555) 123-4567" / "555-123-4567" / "5551234567", "Mr. John Doe" / "john doe".
 */

import type { EntityType } from "./types.js";

const NON_DIGIT_PATTERN = /\P{Nd}/gu;
const NAME_TITLE_PATTERN = /^(mr|mrs|ms|dr|prof)\.?\s+/;
const NAME_SUFFIX_PATTERN = /\s+(jr|sr|phd|md|esq)\.?$/;

const DIGIT_ONLY_TYPES: ReadonlySet<string> = new Set([
  "PHONE_NUMBER",
  "ACCOUNT_NUMBER",
  "CREDIT_CARD_NUMBER",
]);

export function normalizeEntityText(text: string, type: EntityType): string {
  const normalized = text.toLowerCase().trim();

  if (DIGIT_ONLY_TYPES.has(type)) {
    return normalized.replace(NON_DIGIT_PATTERN, "");
  }

  if (type === "PERSON_NAME") {
    return normalized.replace(NAME_TITLE_PATTERN, "").replace(NAME_SUFFIX_PATTERN, "");
  }

  // EMAIL and everything else: case-insensitive comparison only
  return normalized;
}
