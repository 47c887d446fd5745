/**
 * Obfuscation types
 */

// =============================================================================
// Entity Types
// =============================================================================

export const KNOWN_ENTITY_TYPES = [
  "PERSON_NAME",
  "ADDRESS",
  "ACCOUNT_NUMBER",
  "ROUTING_NUMBER",
  "PHONE_NUMBER",
  "EMAIL",
  "ORGANIZATION_NAME",
  "CREDIT_CARD_NUMBER",
  "SSN",
  "DATE_OF_BIRTH",
  "IP_ADDRESS",
  "URL",
] as const;

export type KnownEntityType = (typeof KNOWN_ENTITY_TYPES)[number];

// Open enumeration: detectors may report types the mask registry has never seen
export type EntityType = KnownEntityType | (string & {});

export const UNKNOWN_ENTITY_TYPE = "UNKNOWN";

const KNOWN_TYPE_SET: ReadonlySet<string> = new Set(KNOWN_ENTITY_TYPES);

export function isKnownEntityType(type: string): type is KnownEntityType {
  return KNOWN_TYPE_SET.has(type);
}

// A detected PII span as supplied by the detector collaborator
export type PIIEntity = {
  type: EntityType;
  text: string;
  start?: number;
  end?: number;
  confidence?: number; // 0-1, missing means 1.0
};

// =============================================================================
// Maps
// =============================================================================

// original text -> replacement text
export type ReplacementMap = Map<string, string>;

export type ConsistencyEntry = {
  entityType: EntityType;
  replacement: string;
};

// md5(type:normalizedText) -> replacement
export type ConsistencyMap = Map<string, ConsistencyEntry>;

// =============================================================================
// Document Model
// =============================================================================

export type DocumentMetadata = Record<string, unknown> & {
  obfuscated?: boolean;
  obfuscation_timestamp?: string;
  entities_obfuscated?: number;
  error?: string;
};

/**
 * Document exchanged with the parser and renderer. Blocks and tables come
 * from an external collaborator, so their elements stay `unknown` until
 * narrowed.
 */
export type StatementDocument = {
  full_text: string;
  metadata: DocumentMetadata;
  text_blocks: unknown[];
  tables?: unknown[];
  [key: string]: unknown;
};

// =============================================================================
// Financial Integrity
// =============================================================================

export type Transaction = {
  date?: string;
  description?: string;
  amount?: number;
  balance?: number;
};

export type FinancialIntegritySnapshot = {
  beginning_balance?: number;
  ending_balance?: number;
  transactions?: Transaction[];
  transaction_total?: number;
};

// =============================================================================
// Stage Results
// =============================================================================

export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T>(error: unknown): Result<T> {
  return { ok: false, error: toError(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Guards
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
