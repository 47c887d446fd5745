/**
 * Amount parsing and financial integrity tests
 */

import { describe, it, expect, vi } from "vitest";
import { formatAmount, parseAmount } from "./amounts.js";
import {
  extractFinancialSnapshot,
  extractTransactions,
  isTransactionTable,
  verifyFinancialIntegrity,
} from "./integrity.js";
import type { StatementDocument } from "./types.js";

function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const STATEMENT_TEXT = [
  "Example Bank Statement",
  "Statement Period: 01/01/2025 - 01/31/2025",
  "Beginning Balance: $1,234.56",
  "Ending Balance: $2,345.67",
].join("\n");

const TRANSACTION_TABLE = {
  headers: ["Date", "Description", "Amount", "Balance"],
  rows: [
    ["01/01/2025", "Opening Balance", "", "$1,234.56"],
    ["01/05/2025", "Deposit", "$500.00", "$1,734.56"],
    ["01/10/2025", "Withdrawal", "-$100.00", "$1,634.56"],
    ["01/15/2025", "Payment", "-$200.00", "$1,434.56"],
    ["01/20/2025", "Deposit", "$1,000.00", "$2,434.56"],
    ["01/25/2025", "Fee", "-$88.89", "$2,345.67"],
  ],
};

function statement(overrides: Partial<StatementDocument> = {}): StatementDocument {
  return {
    full_text: STATEMENT_TEXT,
    metadata: {},
    text_blocks: [],
    tables: [TRANSACTION_TABLE],
    ...overrides,
  };
}

// =============================================================================
// Amounts
// =============================================================================

describe("parseAmount", () => {
  it("should read currency formatted strings", () => {
    expect(parseAmount("$1,234.56")).toBe(1234.56);
    expect(parseAmount("-$100.00")).toBe(-100);
    expect(parseAmount(" $0.00 ")).toBe(0);
  });

  it("should yield 0 for unparseable text", () => {
    expect(parseAmount("")).toBe(0);
    expect(parseAmount("n/a")).toBe(0);
    expect(parseAmount("1.2.3")).toBe(0);
    expect(parseAmount("-")).toBe(0);
  });

  it("should read back what formatAmount prints", () => {
    for (const value of [1234.56, -100, 0]) {
      expect(parseAmount(formatAmount(value))).toBe(value);
    }
    expect(formatAmount(1234.56)).toBe("$1,234.56");
    expect(formatAmount(-100)).toBe("-$100.00");
  });
});

// =============================================================================
// Extraction
// =============================================================================

describe("extractFinancialSnapshot", () => {
  it("should read balances and the transaction table", () => {
    const result = extractFinancialSnapshot(statement(), createTestLogger());
    if (!result.ok) throw result.error;
    const snapshot = result.value;

    expect(snapshot.beginning_balance).toBe(1234.56);
    expect(snapshot.ending_balance).toBe(2345.67);
    expect(snapshot.transactions).toHaveLength(6);
    expect(snapshot.transactions?.[1]).toEqual({
      date: "01/05/2025",
      description: "Deposit",
      amount: 500,
      balance: 1734.56,
    });
    expect(snapshot.transactions?.[0]?.amount).toBe(0);
    expect(snapshot.transaction_total).toBeCloseTo(1111.11, 2);
  });

  it("should accept lowercase labels without a colon", () => {
    const result = extractFinancialSnapshot(
      statement({ full_text: "beginning balance $100.00", tables: undefined }),
      createTestLogger(),
    );
    expect(result.ok && result.value).toEqual({ beginning_balance: 100 });
  });

  it("should use the first transaction table only", () => {
    const result = extractFinancialSnapshot(
      statement({
        full_text: "",
        tables: [
          { headers: ["Name", "Value"], rows: [["a", "b"]] },
          { headers: ["Posting Date", "Amount"], rows: [["01/02", "$5.00"]] },
          { headers: ["Date", "Amount"], rows: [["01/03", "$9.00"]] },
        ],
      }),
      createTestLogger(),
    );

    expect(result.ok && result.value).toEqual({
      transactions: [{ date: "01/02", amount: 5 }],
      transaction_total: 5,
    });
  });

  it("should return balances only when tables are missing", () => {
    const result = extractFinancialSnapshot(statement({ tables: undefined }), createTestLogger());
    expect(result.ok && result.value).toEqual({ beginning_balance: 1234.56, ending_balance: 2345.67 });
  });
});

describe("transaction tables", () => {
  it("should recognise headers by keyword", () => {
    expect(isTransactionTable({ headers: ["Transaction Date", "Memo"] })).toBe(true);
    expect(isTransactionTable({ headers: ["Name", "Value"] })).toBe(false);
    expect(isTransactionTable({ rows: [] })).toBe(false);
  });

  it("should skip rows too short for the located columns", () => {
    const transactions = extractTransactions({
      headers: ["Date", "Description", "Amount", "Balance"],
      rows: [["01/01", "Short"], ["01/02", "Coffee", "-$3.50", 96.5], "junk"],
    });

    expect(transactions).toEqual([{ date: "01/02", description: "Coffee", amount: -3.5, balance: 96.5 }]);
  });
});

// =============================================================================
// Verification
// =============================================================================

describe("verifyFinancialIntegrity", () => {
  const before = { beginning_balance: 1234.56, ending_balance: 2345.67 };

  it("should verify an untouched statement", () => {
    const result = verifyFinancialIntegrity(before, statement(), createTestLogger());
    expect(result.ok && result.value.verified).toBe(true);
    expect(result.ok && result.value.mismatches).toEqual([]);
  });

  it("should report a changed balance", () => {
    const log = createTestLogger();
    const result = verifyFinancialIntegrity(
      before,
      statement({ full_text: "Beginning Balance: $1,234.56\nEnding Balance: $9,999.99" }),
      log,
    );

    expect(result.ok && result.value.verified).toBe(false);
    expect(result.ok && result.value.mismatches).toEqual([
      { key: "ending_balance", before: 2345.67, after: 9999.99 },
    ]);
    expect(log.warn).toHaveBeenCalledWith(
      "Financial integrity check failed: ending_balance mismatch (2345.67 -> 9999.99)",
    );
  });

  it("should only compare keys present on both sides", () => {
    const result = verifyFinancialIntegrity(
      before,
      statement({ full_text: "Beginning Balance: $1,234.56" }),
      createTestLogger(),
    );
    expect(result.ok && result.value.verified).toBe(true);
  });
});
