/**
 * Local pattern-based PII detector
 *
 * Regex rules for structured identifiers, context windows for values that
 * only count as PII near a keyword (routing/account numbers, birth dates),
 * label and salutation heuristics for names, and wink-nlp entities for
 * email, URL and person spans. Runs entirely in-process.
 */

import winkNLP, { type ItemEntity } from "wink-nlp";
import model from "wink-eng-lite-web-model";
import { createLogger, type Logger } from "../logger.js";
import type { KnownEntityType, PIIEntity } from "../obfuscation/types.js";
import type { DetectionResult, PiiDetector } from "./types.js";

// =============================================================================
// NLP Initialization (singleton)
// =============================================================================

const nlp = winkNLP(model);
const its = nlp.its;

const NLP_ENTITY_TYPES: ReadonlyMap<string, KnownEntityType> = new Map([
  ["EMAIL", "EMAIL"],
  ["URL", "URL"],
  ["PERSON", "PERSON_NAME"],
]);

// =============================================================================
// Rule Definitions
// =============================================================================

type PatternRule = {
  type: KnownEntityType;
  pattern: RegExp;
  confidence: number;
};

const STREET_SUFFIX =
  "(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln|Court|Ct|Way|Place|Pl|Terrace|Ter|Circle|Cir|Parkway|Pkwy|Highway|Hwy)";

const RULES: PatternRule[] = [
  {
    type: "URL",
    pattern: /https?:\/\/[^\s<>"{}|\\^`[\]]+/g,
    confidence: 0.9,
  },
  {
    type: "EMAIL",
    pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
    confidence: 0.95,
  },
  // 4 groups of 4 digits
  {
    type: "CREDIT_CARD_NUMBER",
    pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
    confidence: 0.9,
  },
  {
    type: "SSN",
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    confidence: 0.9,
  },
  {
    type: "IP_ADDRESS",
    pattern: /\b(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/g,
    confidence: 0.85,
  },
  // US formats, parenthesized area codes, optional country code
  {
    type: "PHONE_NUMBER",
    pattern: /(?:\+?[0-9]{1,3}[-\s.]?)?\(?\b[0-9]{3}\)?[-\s.][0-9]{3}[-\s.][0-9]{4}\b/g,
    confidence: 0.9,
  },
  // Street line with city, state and ZIP
  {
    type: "ADDRESS",
    pattern: new RegExp(
      `(?<![./$\\d])\\d{1,5}[^\\S\\n]+[A-Za-z0-9 .]+?[^\\S\\n]${STREET_SUFFIX}\\.?` +
        `(?:,?[^\\S\\n]+(?:Suite|Ste|Apt|Unit|#)[^\\S\\n]*\\w+)?` +
        `,?[^\\S\\n]+[A-Za-z .]+?,?[^\\S\\n]+[A-Z]{2}[^\\S\\n]+\\d{5}(?:-\\d{4})?\\b`,
      "g",
    ),
    confidence: 0.9,
  },
  // Street line alone
  {
    type: "ADDRESS",
    pattern: new RegExp(
      `(?<![./$\\d])\\d{1,5}[^\\S\\n]+(?:[A-Za-z0-9.]+[^\\S\\n]+){1,4}?${STREET_SUFFIX}\\.?(?![A-Za-z])`,
      "g",
    ),
    confidence: 0.75,
  },
  {
    type: "PERSON_NAME",
    pattern:
      /\b(?:Name|Customer|Account Holder|Account Name|Member|Primary Owner)[^\S\n]*:[^\S\n]*([A-Z][A-Za-z'.-]+(?:[^\S\n]+[A-Z][A-Za-z'.-]+){1,3})/g,
    confidence: 0.9,
  },
  {
    type: "PERSON_NAME",
    pattern: /\bDear[^\S\n]+([A-Z][a-z]+(?:[^\S\n]+[A-Z][a-z]+){0,2})/g,
    confidence: 0.85,
  },
];

// =============================================================================
// Bank Account & Routing Number Detection
// =============================================================================

const BANK_KEYWORDS = /\b(?:account|acct|routing|ABA|checking|savings|direct\s+deposit)\b/gi;
const ROUTING_NUMBER_PATTERN = /\b\d{9}\b/g;
const ACCOUNT_NUMBER_PATTERN = /\b\d{8,17}\b/g;
const MASKED_ACCOUNT_PATTERN = /(?<![\w*])(?:[Xx*]{4}[-\s]?){1,3}\d{4}\b/g;
const BANK_CONTEXT_WINDOW = 120; // characters

// Federal Reserve routing symbol prefixes
const ABA_VALID_PREFIXES = new Set([
  "01", "02", "03", "04", "05", "06", "07", "08", "09", "10", "11", "12",
  "21", "22", "23", "24", "25", "26", "27", "28", "29", "30", "31", "32",
  "61", "62", "63", "64", "65", "66", "67", "68", "69", "70", "71", "72",
  "80",
]);

/**
 * ABA checksum: 3(d1+d4+d7) + 7(d2+d5+d8) + (d3+d6+d9) must be a multiple of 10.
 */
export function isValidRoutingNumber(value: string): boolean {
  if (!/^\d{9}$/.test(value)) return false;
  if (!ABA_VALID_PREFIXES.has(value.slice(0, 2))) return false;

  const d = value.split("").map(Number);
  const weights = [3, 7, 1, 3, 7, 1, 3, 7, 1];
  const checksum = d.reduce((sum, digit, i) => sum + digit * (weights[i] ?? 0), 0);
  return checksum % 10 === 0;
}

function keywordPositions(content: string, keywords: RegExp): number[] {
  const positions: number[] = [];
  keywords.lastIndex = 0;
  let km: RegExpExecArray | null;
  while ((km = keywords.exec(content)) !== null) {
    positions.push(km.index);
  }
  return positions;
}

function isNear(positions: readonly number[], index: number, window: number): boolean {
  return positions.some((kp) => Math.abs(kp - index) <= window);
}

function collectBankMatches(content: string): PIIEntity[] {
  const matches: PIIEntity[] = [];
  const positions = keywordPositions(content, BANK_KEYWORDS);
  if (positions.length === 0) return matches;

  let m: RegExpExecArray | null;

  ROUTING_NUMBER_PATTERN.lastIndex = 0;
  while ((m = ROUTING_NUMBER_PATTERN.exec(content)) !== null) {
    if (!isValidRoutingNumber(m[0])) continue;
    if (!isNear(positions, m.index, BANK_CONTEXT_WINDOW)) continue;
    matches.push(span("ROUTING_NUMBER", m[0], m.index, 0.9));
  }

  ACCOUNT_NUMBER_PATTERN.lastIndex = 0;
  while ((m = ACCOUNT_NUMBER_PATTERN.exec(content)) !== null) {
    // 9 digits near a bank keyword is a routing number, valid or not
    if (m[0].length === 9) continue;
    if (!isNear(positions, m.index, BANK_CONTEXT_WINDOW)) continue;
    matches.push(span("ACCOUNT_NUMBER", m[0], m.index, 0.9));
  }

  MASKED_ACCOUNT_PATTERN.lastIndex = 0;
  while ((m = MASKED_ACCOUNT_PATTERN.exec(content)) !== null) {
    if (!isNear(positions, m.index, BANK_CONTEXT_WINDOW)) continue;
    matches.push(span("ACCOUNT_NUMBER", m[0], m.index, 0.85));
  }

  return matches;
}

// =============================================================================
// Date of Birth Detection
// =============================================================================

const DOB_KEYWORDS = /\b(?:DOB|date\s+of\s+birth|birthdate|birth\s+date|birthday|born)\b/gi;
const DATE_PATTERN = /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/g;
const ISO_DATE_PATTERN = /\b\d{4}[/-]\d{1,2}[/-]\d{1,2}\b/g;
const DOB_CONTEXT_WINDOW = 60; // characters

function collectDobMatches(content: string): PIIEntity[] {
  const matches: PIIEntity[] = [];
  const positions = keywordPositions(content, DOB_KEYWORDS);
  if (positions.length === 0) return matches;

  for (const pattern of [DATE_PATTERN, ISO_DATE_PATTERN]) {
    pattern.lastIndex = 0;
    let dm: RegExpExecArray | null;
    while ((dm = pattern.exec(content)) !== null) {
      if (isNear(positions, dm.index, DOB_CONTEXT_WINDOW)) {
        matches.push(span("DATE_OF_BIRTH", dm[0], dm.index, 0.9));
      }
    }
  }

  return matches;
}

// =============================================================================
// Rule and NLP Matches
// =============================================================================

function span(type: KnownEntityType, text: string, start: number, confidence: number): PIIEntity {
  return { type, text, start, end: start + text.length, confidence };
}

function collectRuleMatches(content: string): PIIEntity[] {
  const matches: PIIEntity[] = [];

  for (const rule of RULES) {
    rule.pattern.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = rule.pattern.exec(content)) !== null) {
      // Rules with a capture group report only the captured value
      const captured = m[1];
      const text = captured ?? m[0];
      const start = captured !== undefined ? m.index + m[0].length - captured.length : m.index;
      matches.push(span(rule.type, text, start, rule.confidence));
    }
  }

  return matches;
}

function collectNlpMatches(content: string): PIIEntity[] {
  const matches: PIIEntity[] = [];
  const cursors = new Map<string, number>();

  const doc = nlp.readDoc(content);
  doc.entities().each((entity: ItemEntity) => {
    const nlpType: unknown = entity.out(its.type);
    const value: unknown = entity.out();
    if (typeof nlpType !== "string" || typeof value !== "string") return;

    const type = NLP_ENTITY_TYPES.get(nlpType);
    // Trim to first line only to prevent cross-line over-capture
    const text = value.split("\n")[0]?.trim() ?? "";
    if (!type || text.length <= 1) return;

    const start = content.indexOf(text, cursors.get(text) ?? 0);
    if (start < 0) return;
    cursors.set(text, start + text.length);
    matches.push(span(type, text, start, 0.85));
  });

  return matches;
}

/**
 * When spans overlap the longer one wins, then the earlier one, then the one
 * collected first. The survivors come back in document order.
 */
export function resolveOverlaps(matches: readonly PIIEntity[]): PIIEntity[] {
  const ranked = [...matches].sort((a, b) => {
    const lengthDiff = b.text.length - a.text.length;
    return lengthDiff !== 0 ? lengthDiff : (a.start ?? 0) - (b.start ?? 0);
  });

  const kept: PIIEntity[] = [];
  for (const candidate of ranked) {
    const start = candidate.start ?? 0;
    const end = candidate.end ?? start + candidate.text.length;
    const overlaps = kept.some((other) => {
      const otherStart = other.start ?? 0;
      const otherEnd = other.end ?? otherStart + other.text.length;
      return start < otherEnd && otherStart < end;
    });
    if (!overlaps) kept.push(candidate);
  }

  return kept.sort((a, b) => (a.start ?? 0) - (b.start ?? 0));
}

// =============================================================================
// Detector
// =============================================================================

/**
 * Every span found in `content`, overlap-resolved, in document order.
 * Context-gated bank matches are collected first so they win ties against
 * the generic digit rules.
 */
export function detectPatterns(content: string): PIIEntity[] {
  return resolveOverlaps([
    ...collectBankMatches(content),
    ...collectDobMatches(content),
    ...collectRuleMatches(content),
    ...collectNlpMatches(content),
  ]);
}

export class PatternDetector implements PiiDetector {
  readonly name = "pattern";
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = createLogger(logger, "pattern-detector");
  }

  async detect(text: string): Promise<DetectionResult> {
    const startTime = Date.now();
    const entities = detectPatterns(text);
    this.log.info(
      `Detected ${entities.length} PII entities in ${text.length} chars (${Date.now() - startTime}ms)`,
    );
    return { entities, chunksAnalyzed: 1 };
  }
}
