/**
 * Document obfuscation orchestrator
 *
 * validate -> snapshot -> copy -> build map -> substitute -> verify -> annotate
 *
 * Every stage reports through a Result. Only this boundary turns a failure
 * into the degraded document `{ full_text, metadata: { error, obfuscated: false },
 * text_blocks: [] }`; obfuscate() itself never throws. Per-call state (maps,
 * snapshots) lives in locals, so an instance can be reused freely.
 */

import { DEFAULT_CONFIG } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { extractFinancialSnapshot, verifyFinancialIntegrity, type IntegrityMismatch } from "./integrity.js";
import { DEFAULT_MASKERS, createMaskRegistry, type MaskGenerator, type MaskRegistry } from "./maskers.js";
import { buildReplacementMap } from "./replacement-map.js";
import { substituteDocument } from "./substitution.js";
import {
  type ConsistencyMap,
  type FinancialIntegritySnapshot,
  type ReplacementMap,
  type Result,
  type StatementDocument,
  describeType,
  err,
  isList,
  isRecord,
  ok,
  toError,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type ObfuscatorOptions = {
  confidenceThreshold?: number;
  maskers?: Readonly<Record<string, MaskGenerator>>;
  logger?: Logger;
  now?: () => Date;
};

export type IntegrityReport = {
  before: FinancialIntegritySnapshot;
  after?: FinancialIntegritySnapshot;
  verified: boolean;
  mismatches: IntegrityMismatch[];
};

export type ObfuscationReport = {
  replacementMap: ReplacementMap;
  consistencyMap: ConsistencyMap;
  entitiesReceived: number;
  integrity: IntegrityReport;
  degraded: boolean;
  error?: string;
  durationMs: number;
};

export type ObfuscationOutcome = {
  document: StatementDocument;
  report: ObfuscationReport;
};

// =============================================================================
// Stages
// =============================================================================

/**
 * Check the top-level shape and fill safe defaults for missing fields.
 * Works on a shallow copy; the caller's object is never modified.
 */
export function validateDocument(document: unknown, log: Logger): Result<StatementDocument> {
  if (!isRecord(document)) {
    return err(new TypeError(`Document must be an object, got ${describeType(document)}`));
  }

  let fullText = "";
  if (typeof document.full_text === "string") {
    fullText = document.full_text;
  } else {
    log.warn(`Document 'full_text' is ${describeType(document.full_text)}, using empty string`);
  }

  let metadata: Record<string, unknown> = {};
  if (isRecord(document.metadata)) {
    metadata = document.metadata;
  } else {
    log.warn(`Document 'metadata' is ${describeType(document.metadata)}, using empty object`);
  }

  let textBlocks: unknown[] = [];
  if (isList(document.text_blocks)) {
    textBlocks = document.text_blocks;
  } else if (document.text_blocks === undefined) {
    log.warn("Document missing 'text_blocks', using empty list");
  } else {
    log.warn(`text_blocks is not a list: ${describeType(document.text_blocks)}`);
    textBlocks = [{ text: fullText }];
  }

  const validated: StatementDocument = {
    ...document,
    full_text: fullText,
    metadata,
    text_blocks: textBlocks,
  };

  if (document.tables !== undefined && !isList(document.tables)) {
    log.warn(`tables is not a list: ${describeType(document.tables)}`);
    validated.tables = [];
  }

  return ok(validated);
}

export function copyDocument(document: StatementDocument): Result<StatementDocument> {
  try {
    return ok(structuredClone(document));
  } catch (error) {
    return err(error);
  }
}

/**
 * Minimal well-formed document returned when obfuscation fails: nothing is
 * redacted and `metadata.obfuscated` says so.
 */
export function fallbackDocument(document: unknown, error: Error): StatementDocument {
  const fullText = isRecord(document) && typeof document.full_text === "string" ? document.full_text : "";
  return {
    full_text: fullText,
    metadata: {
      error: error.message,
      obfuscated: false,
    },
    text_blocks: [],
  };
}

// =============================================================================
// Obfuscator
// =============================================================================

export class Obfuscator {
  private readonly confidenceThreshold: number;
  private readonly maskers: MaskRegistry;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: ObfuscatorOptions = {}) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIG.confidenceThreshold;
    this.maskers = options.maskers ? createMaskRegistry(options.maskers) : DEFAULT_MASKERS;
    this.log = createLogger(options.logger, "obfuscator");
    this.now = options.now ?? (() => new Date());

    this.log.debug?.(`Initialized obfuscator (confidence threshold ${this.confidenceThreshold})`);
  }

  /**
   * Mask every accepted entity across the document's text views. Always
   * returns a document; check `metadata.obfuscated` to tell success from
   * degraded output.
   */
  obfuscate(document: unknown, entities: unknown, confidenceThreshold?: number): StatementDocument {
    return this.obfuscateWithReport(document, entities, confidenceThreshold).document;
  }

  obfuscateWithReport(
    document: unknown,
    entities: unknown,
    confidenceThreshold: number = this.confidenceThreshold,
  ): ObfuscationOutcome {
    const startTime = Date.now();
    const report: ObfuscationReport = {
      replacementMap: new Map(),
      consistencyMap: new Map(),
      entitiesReceived: isList(entities) ? entities.length : 0,
      integrity: { before: {}, verified: true, mismatches: [] },
      degraded: false,
      durationMs: 0,
    };

    try {
      // 1. Validate
      if (!isList(entities)) {
        throw new TypeError(`PII entities must be a list, got ${describeType(entities)}`);
      }
      const validated = validateDocument(document, this.log);
      if (!validated.ok) throw validated.error;

      // 2. Snapshot
      const snapshot = extractFinancialSnapshot(validated.value, this.log);
      if (snapshot.ok) {
        report.integrity.before = snapshot.value;
      }

      // 3. Copy
      const copied = copyDocument(validated.value);
      let obfuscated = validated.value;
      if (copied.ok) {
        obfuscated = copied.value;
      } else {
        this.log.error(`Error creating deep copy, continuing on the original: ${copied.error.message}`);
      }

      // 4. Build map
      const built = buildReplacementMap(entities, {
        confidenceThreshold,
        maskers: this.maskers,
        log: this.log,
      });
      if (built.ok) {
        report.replacementMap = built.value.replacementMap;
        report.consistencyMap = built.value.consistencyMap;
      } else {
        this.log.error(`Continuing with an empty replacement map: ${built.error.message}`);
      }

      // 5. Substitute
      substituteDocument(obfuscated, report.replacementMap, this.log);

      // 6. Verify
      const verification = verifyFinancialIntegrity(report.integrity.before, obfuscated, this.log);
      if (verification.ok) {
        report.integrity.after = verification.value.after;
        report.integrity.verified = verification.value.verified;
        report.integrity.mismatches = verification.value.mismatches;
        if (!verification.value.verified) {
          this.log.warn("Financial integrity check failed after obfuscation");
        }
      } else {
        report.integrity.verified = false;
      }

      // 7. Annotate
      obfuscated.metadata = {
        ...obfuscated.metadata,
        obfuscated: true,
        obfuscation_timestamp: this.now().toISOString(),
        entities_obfuscated: report.replacementMap.size,
      };

      report.durationMs = Date.now() - startTime;
      this.log.info(
        `Obfuscated document with ${report.replacementMap.size} PII replacements in ${report.durationMs}ms`,
      );
      return { document: obfuscated, report };
    } catch (caught) {
      const error = toError(caught);
      this.log.error(`Obfuscation failed, returning unredacted fallback: ${error.message}`);

      report.replacementMap = new Map();
      report.consistencyMap = new Map();
      report.degraded = true;
      report.error = error.message;
      report.durationMs = Date.now() - startTime;
      return { document: fallbackDocument(document, error), report };
    }
  }
}

/**
 * One-shot helper for callers that do not keep an Obfuscator around.
 */
export function obfuscateDocument(
  document: unknown,
  entities: unknown,
  confidenceThreshold?: number,
  options: ObfuscatorOptions = {},
): StatementDocument {
  return new Obfuscator(options).obfuscate(document, entities, confidenceThreshold);
}
