/**
 * Type-specific mask generators
 *
 * Each generator turns an entity's text into a replacement that keeps the
 * shape of the original (separators, token lengths, last four digits where a
 * statement conventionally shows them) and drops its information content.
 * Generators are total: any string in, a string out, no exceptions.
 */

import type { EntityType, KnownEntityType } from "./types.js";

export type MaskGenerator = (text: string, entityType: EntityType) => string;

export type MaskRegistry = ReadonlyMap<EntityType, MaskGenerator>;

const MASK_CHAR = "X";
// Decimal digits and letters in any script, not just ASCII
const DIGIT_PATTERN = /\p{Nd}/gu;
const DIGIT_CHAR = /^\p{Nd}$/u;
const NON_DIGIT_PATTERN = /\P{Nd}/gu;
const ALPHANUMERIC_PATTERN = /[\p{L}\p{M}\p{N}]/gu;
const KEPT_DIGITS = 4;

// =============================================================================
// Building Blocks
// =============================================================================

function maskRun(length: number): string {
  return MASK_CHAR.repeat(length);
}

function isDigit(ch: string): boolean {
  return DIGIT_CHAR.test(ch);
}

function countDigits(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (isDigit(ch)) count++;
  }
  return count;
}

function lastDigits(text: string, count: number): string {
  return text.replace(NON_DIGIT_PATTERN, "").slice(-count);
}

export function maskDigits(text: string): string {
  return text.replace(DIGIT_PATTERN, MASK_CHAR);
}

/**
 * Mask every digit except the last `keep` digits, which stay in place.
 * Separators are untouched. Fewer than `keep` digits: mask them all.
 */
export function maskAllButLastDigits(text: string, keep: number = KEPT_DIGITS): string {
  const total = countDigits(text);
  if (total < keep) return maskDigits(text);

  let seen = 0;
  let masked = "";
  for (const ch of text) {
    if (isDigit(ch)) {
      seen++;
      masked += seen > total - keep ? ch : MASK_CHAR;
    } else {
      masked += ch;
    }
  }
  return masked;
}

/**
 * Mask each dot-separated label with an equal-length run; empty labels
 * (consecutive dots) stay empty.
 */
export function maskDomain(domain: string): string {
  return domain
    .split(".")
    .map((label) => (label ? maskRun(label.length) : ""))
    .join(".");
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

// =============================================================================
// Generators
// =============================================================================

export function maskPersonName(text: string): string {
  return splitWords(text)
    .map((word) => maskRun(word.length))
    .join(" ");
}

export function maskAddress(text: string): string {
  return text.replace(ALPHANUMERIC_PATTERN, MASK_CHAR);
}

export function maskAccountNumber(text: string): string {
  return maskAllButLastDigits(text);
}

export function maskCreditCardNumber(text: string): string {
  const digits = countDigits(text);
  if (digits >= 16) {
    return `XXXX-XXXX-XXXX-${lastDigits(text, KEPT_DIGITS)}`;
  }
  return maskAllButLastDigits(text);
}

export function maskSsn(text: string): string {
  if (countDigits(text) === 9) {
    return `XXX-XX-${lastDigits(text, KEPT_DIGITS)}`;
  }
  return maskAllButLastDigits(text);
}

export function maskEmail(text: string): string {
  const parts = text.split("@");
  if (parts.length !== 2) {
    return maskRun(text.length);
  }

  const [local = "", domain = ""] = parts;
  const maskedLocal = local.length > 1 ? local[0] + maskRun(local.length - 1) : MASK_CHAR;
  return `${maskedLocal}@${maskDomain(domain)}`;
}

export function maskOrganizationName(text: string): string {
  // Connectives such as "of", "in", "&" survive
  return splitWords(text)
    .map((word) => (word.length <= 2 ? word : maskRun(word.length)))
    .join(" ");
}

export function maskUrl(text: string): string {
  const protocolIndex = text.indexOf("://");
  const protocol = protocolIndex >= 0 ? text.slice(0, protocolIndex) : "";
  const rest = protocolIndex >= 0 ? text.slice(protocolIndex + 3) : text;
  const prefix = protocol ? `${protocol}://` : "";

  const slashIndex = rest.indexOf("/");
  if (slashIndex < 0) {
    return `${prefix}${maskDomain(rest)}`;
  }

  const domain = rest.slice(0, slashIndex);
  const path = rest.slice(slashIndex + 1);
  return `${prefix}${maskDomain(domain)}/${maskRun(path.length)}`;
}

/**
 * Fallback for types without a generator: a deliberately lossy,
 * recognisable marker such as `MEM_XXXX`.
 */
export function maskUnknown(text: string, entityType: EntityType): string {
  const prefix = entityType.length >= 3 ? entityType.slice(0, 3) : entityType;
  return `${prefix}_${maskRun(Math.floor(text.length / 2))}`;
}

// =============================================================================
// Registry
// =============================================================================

const BUILTIN_MASKERS = {
  PERSON_NAME: maskPersonName,
  ADDRESS: maskAddress,
  ACCOUNT_NUMBER: maskAccountNumber,
  ROUTING_NUMBER: maskDigits,
  PHONE_NUMBER: maskDigits,
  EMAIL: maskEmail,
  ORGANIZATION_NAME: maskOrganizationName,
  CREDIT_CARD_NUMBER: maskCreditCardNumber,
  SSN: maskSsn,
  DATE_OF_BIRTH: maskDigits,
  IP_ADDRESS: maskDigits,
  URL: maskUrl,
} satisfies Record<KnownEntityType, MaskGenerator>;

export const DEFAULT_MASKERS: MaskRegistry = new Map<EntityType, MaskGenerator>(
  Object.entries(BUILTIN_MASKERS),
);

/**
 * Built-in generators plus caller-supplied ones; an override for a known
 * type replaces the built-in.
 */
export function createMaskRegistry(
  overrides: Readonly<Record<string, MaskGenerator>> = {},
): MaskRegistry {
  const registry = new Map(DEFAULT_MASKERS);
  for (const [type, generator] of Object.entries(overrides)) {
    registry.set(type, generator);
  }
  return registry;
}

export function maskEntityText(
  text: string,
  entityType: EntityType,
  registry: MaskRegistry = DEFAULT_MASKERS,
): string {
  const generator = registry.get(entityType) ?? maskUnknown;
  return generator(text, entityType);
}
