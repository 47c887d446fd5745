/**
 * Text substitution engine
 *
 * Applies one replacement map to every textual view of a document (full
 * text, text blocks, table cells) so all views stay consistent.
 */

import type { Logger } from "../logger.js";
import {
  type ReplacementMap,
  type StatementDocument,
  describeType,
  isList,
  isRecord,
} from "./types.js";

// Keys containing these are already-delimited tokens (phone numbers, SSNs,
// dotted domains) where word boundaries either miss or over-match
const PUNCTUATED_KEY_PATTERN = /[().-]/;

// Word characters in any script, combining marks included (`\b` is ASCII-only)
const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}_]";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Keys longest first, so a short value that is a substring of a longer one
 * (a 4-digit fragment of an account number) cannot corrupt the longer match.
 * Equal lengths keep map order.
 */
export function orderReplacementKeys(replacementMap: ReplacementMap): string[] {
  return [...replacementMap.keys()].sort((a, b) => b.length - a.length);
}

function replaceKey(text: string, key: string, replacement: string): string {
  if (PUNCTUATED_KEY_PATTERN.test(key)) {
    return text.split(key).join(replacement);
  }
  const pattern = new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(key)}(?!${WORD_CHAR})`, "gu");
  return text.replace(pattern, () => replacement);
}

export function applyReplacements(
  text: string,
  replacementMap: ReplacementMap,
  orderedKeys: readonly string[] = orderReplacementKeys(replacementMap),
): string {
  let result = text;
  for (const key of orderedKeys) {
    // A blank key would match the spacing between words
    if (!key.trim()) continue;
    const replacement = replacementMap.get(key);
    if (replacement === undefined) continue;
    result = replaceKey(result, key, replacement);
  }
  return result;
}

// =============================================================================
// Document Substitution
// =============================================================================

/**
 * Substitute in place across `full_text`, `text_blocks[*].text` and every
 * string cell of `tables[*].rows`. Malformed shapes are logged and coerced:
 * non-list blocks become a single block holding the full text, non-list
 * tables become empty, and non-list rows are left alone.
 */
export function substituteDocument(
  document: StatementDocument,
  replacementMap: ReplacementMap,
  log: Logger,
): StatementDocument {
  const orderedKeys = orderReplacementKeys(replacementMap);
  const apply = (text: string) => applyReplacements(text, replacementMap, orderedKeys);

  document.full_text = apply(document.full_text);

  const blocks: unknown = document.text_blocks;
  if (!isList(blocks)) {
    log.warn(`text_blocks is not a list: ${describeType(blocks)}`);
    document.text_blocks = [{ text: document.full_text }];
  } else {
    for (const block of blocks) {
      if (!isRecord(block)) {
        log.warn(`Text block is not an object: ${describeType(block)}`);
        continue;
      }
      if (typeof block.text === "string") {
        block.text = apply(block.text);
      }
    }
  }

  if ("tables" in document && document.tables !== undefined) {
    const tables: unknown = document.tables;
    if (!isList(tables)) {
      log.warn(`tables is not a list: ${describeType(tables)}`);
      document.tables = [];
    } else {
      for (const table of tables) {
        substituteTable(table, apply, log);
      }
    }
  }

  return document;
}

function substituteTable(table: unknown, apply: (text: string) => string, log: Logger): void {
  if (!isRecord(table)) {
    log.warn(`Table is not an object: ${describeType(table)}`);
    return;
  }

  const rows: unknown = table.rows ?? [];
  if (!isList(rows)) {
    log.warn(`Table rows is not a list: ${describeType(rows)}`);
    return;
  }

  for (const row of rows) {
    if (!isList(row)) {
      log.warn(`Table row is not a list: ${describeType(row)}`);
      continue;
    }
    for (let k = 0; k < row.length; k++) {
      const cell: unknown = row[k];
      if (typeof cell === "string") {
        row[k] = apply(cell);
      }
    }
  }
}
