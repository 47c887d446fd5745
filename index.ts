/**
 * statement-redactor - Format-preserving PII obfuscation for bank statements
 *
 * Masks personal data across a parsed statement's full text, text blocks
 * and tables while keeping amounts and balances intact, then checks that
 * the financial figures survived. Detection runs locally: rule-based, or
 * through a local Ollama model.
 */

// =============================================================================
// Obfuscation
// =============================================================================

export { Obfuscator, obfuscateDocument, validateDocument, copyDocument, fallbackDocument } from "./obfuscation/obfuscator.js";
export type {
  ObfuscatorOptions,
  ObfuscationOutcome,
  ObfuscationReport,
  IntegrityReport,
} from "./obfuscation/obfuscator.js";

export { parseAmount, formatAmount } from "./obfuscation/amounts.js";
export { normalizeEntityText } from "./obfuscation/normalizer.js";
export { groupEntities, groupKey, selectRepresentative, type EntityGroups } from "./obfuscation/grouper.js";
export {
  DEFAULT_MASKERS,
  createMaskRegistry,
  maskEntityText,
  type MaskGenerator,
  type MaskRegistry,
} from "./obfuscation/maskers.js";
export {
  buildReplacementMap,
  computeEntityHash,
  type ReplacementMapOptions,
  type ReplacementMapResult,
} from "./obfuscation/replacement-map.js";
export { applyReplacements, orderReplacementKeys, substituteDocument } from "./obfuscation/substitution.js";
export {
  extractFinancialSnapshot,
  extractTransactions,
  verifyFinancialIntegrity,
  type IntegrityMismatch,
  type IntegrityVerification,
} from "./obfuscation/integrity.js";
export {
  KNOWN_ENTITY_TYPES,
  UNKNOWN_ENTITY_TYPE,
  isKnownEntityType,
  type ConsistencyEntry,
  type ConsistencyMap,
  type DocumentMetadata,
  type EntityType,
  type FinancialIntegritySnapshot,
  type KnownEntityType,
  type PIIEntity,
  type ReplacementMap,
  type Result,
  type StatementDocument,
  type Transaction,
} from "./obfuscation/types.js";

// =============================================================================
// Detection, Review and Audit
// =============================================================================

export * from "./detection/index.js";
export { EntityReview } from "./review/entity-review.js";
export type { EntityChanges, EntityReviewOptions, NewEntity, ReviewedEntity } from "./review/entity-review.js";
export { ObfuscationStore, createObfuscationStore } from "./memory/store.js";
export type { RunLogEntry, RunLogInput, StoreStats } from "./memory/store.js";

// =============================================================================
// Configuration and Logging
// =============================================================================

export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  resolveConfig,
  validateConfig,
  type PartialConfig,
  type StatementRedactorConfig,
} from "./config.js";
export { consoleLogger, createLogger, type Logger } from "./logger.js";
