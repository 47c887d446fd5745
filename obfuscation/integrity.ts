/**
 * Financial integrity checks
 *
 * Balances and transaction amounts share numeric-looking text with some PII
 * (account numbers), so substitution can damage them. A snapshot taken
 * before substitution is compared with one taken after. Mismatches are
 * advisory: they are reported, never fatal.
 */

import type { Logger } from "../logger.js";
import { parseAmount } from "./amounts.js";
import {
  type FinancialIntegritySnapshot,
  type Result,
  type StatementDocument,
  type Transaction,
  describeType,
  err,
  isList,
  isRecord,
  ok,
} from "./types.js";

const BEGINNING_BALANCE_PATTERN = /beginning\s+balance:?\s*\$?([\d,]+\.\d{2})/i;
const ENDING_BALANCE_PATTERN = /ending\s+balance:?\s*\$?([\d,]+\.\d{2})/i;
const TRANSACTION_HEADER_KEYWORDS = ["date", "description", "amount", "balance"];

// Only these are compared; transaction-level figures are extracted for reporting
const COMPARED_KEYS = ["beginning_balance", "ending_balance"] as const;

export type IntegrityMismatch = {
  key: (typeof COMPARED_KEYS)[number];
  before: number;
  after: number;
};

export type IntegrityVerification = {
  verified: boolean;
  after: FinancialIntegritySnapshot;
  mismatches: IntegrityMismatch[];
};

// =============================================================================
// Extraction
// =============================================================================

function matchBalance(text: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(text);
  return match?.[1] !== undefined ? parseAmount(match[1]) : undefined;
}

function extractBalances(fullText: string): FinancialIntegritySnapshot {
  const snapshot: FinancialIntegritySnapshot = {};
  const beginning = matchBalance(fullText, BEGINNING_BALANCE_PATTERN);
  if (beginning !== undefined) snapshot.beginning_balance = beginning;
  const ending = matchBalance(fullText, ENDING_BALANCE_PATTERN);
  if (ending !== undefined) snapshot.ending_balance = ending;
  return snapshot;
}

function readHeaders(table: Record<string, unknown>): string[] {
  const headers: unknown = table.headers ?? [];
  if (!isList(headers)) return [];
  return headers.map((header) => (typeof header === "string" ? header.toLowerCase() : ""));
}

export function isTransactionTable(table: Record<string, unknown>): boolean {
  const headerText = readHeaders(table).join(" ");
  return TRANSACTION_HEADER_KEYWORDS.some((keyword) => headerText.includes(keyword));
}

function cellText(row: unknown[], column: number | undefined): string | undefined {
  if (column === undefined) return undefined;
  const cell = row[column];
  if (typeof cell === "string") return cell;
  if (typeof cell === "number") return String(cell);
  return "";
}

/**
 * Read `{date, description, amount, balance}` per row, locating columns by
 * header name. Rows too short to reach every located column are skipped.
 */
export function extractTransactions(table: Record<string, unknown>): Transaction[] {
  const headers = readHeaders(table);
  const columnOf = (name: string) => {
    const index = headers.findIndex((header) => header.includes(name));
    return index >= 0 ? index : undefined;
  };

  const dateCol = columnOf("date");
  const descCol = columnOf("description");
  const amountCol = columnOf("amount");
  const balanceCol = columnOf("balance");

  const located = [dateCol, descCol, amountCol, balanceCol].filter(
    (col): col is number => col !== undefined,
  );
  const minLength = located.length > 0 ? Math.max(...located) + 1 : 0;

  const rows: unknown = table.rows ?? [];
  if (!isList(rows)) return [];

  const transactions: Transaction[] = [];
  for (const row of rows) {
    if (!isList(row) || row.length < minLength) continue;

    const transaction: Transaction = {};
    const date = cellText(row, dateCol);
    if (date !== undefined) transaction.date = date;
    const description = cellText(row, descCol);
    if (description !== undefined) transaction.description = description;
    const amount = cellText(row, amountCol);
    if (amount !== undefined) transaction.amount = parseAmount(amount);
    const balance = cellText(row, balanceCol);
    if (balance !== undefined) transaction.balance = parseAmount(balance);

    transactions.push(transaction);
  }

  return transactions;
}

export function extractFinancialSnapshot(
  document: StatementDocument,
  log: Logger,
): Result<FinancialIntegritySnapshot> {
  try {
    const snapshot = extractBalances(document.full_text);

    if (document.tables !== undefined) {
      const tables: unknown = document.tables;
      if (!isList(tables)) {
        log.warn(`tables is not a list: ${describeType(tables)}`);
        return ok(snapshot);
      }

      const transactionTable = tables.find(
        (table): table is Record<string, unknown> => isRecord(table) && isTransactionTable(table),
      );
      if (transactionTable) {
        const transactions = extractTransactions(transactionTable);
        snapshot.transactions = transactions;
        snapshot.transaction_total = transactions.reduce((sum, t) => sum + (t.amount ?? 0), 0);
      }
    }

    return ok(snapshot);
  } catch (error) {
    log.error(`Error extracting financial data: ${error}`);
    return err(error);
  }
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Re-extract balances from the substituted document and compare every key
 * present in both snapshots for exact equality.
 */
export function verifyFinancialIntegrity(
  before: FinancialIntegritySnapshot,
  document: StatementDocument,
  log: Logger,
): Result<IntegrityVerification> {
  try {
    const after = extractBalances(document.full_text);
    const mismatches: IntegrityMismatch[] = [];

    for (const key of COMPARED_KEYS) {
      const previous = before[key];
      const current = after[key];
      if (previous !== undefined && current !== undefined && previous !== current) {
        mismatches.push({ key, before: previous, after: current });
        log.warn(`Financial integrity check failed: ${key} mismatch (${previous} -> ${current})`);
      }
    }

    return ok({ verified: mismatches.length === 0, after, mismatches });
  } catch (error) {
    log.error(`Error verifying financial integrity: ${error}`);
    return err(error);
  }
}
