/**
 * Replacement map builder tests
 */

import crypto from "node:crypto";
import { describe, it, expect, vi } from "vitest";
import { createMaskRegistry } from "./maskers.js";
import { buildReplacementMap, coerceEntity, computeEntityHash } from "./replacement-map.js";

function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function build(entities: unknown[], confidenceThreshold = 0.85, log = createTestLogger()) {
  const result = buildReplacementMap(entities, { confidenceThreshold, log });
  if (!result.ok) throw result.error;
  return result.value;
}

// =============================================================================
// Building
// =============================================================================

describe("buildReplacementMap", () => {
  it("should map a single name", () => {
    const { replacementMap } = build([{ type: "PERSON_NAME", text: "John Doe", confidence: 0.95 }]);
    expect([...replacementMap]).toEqual([["John Doe", "XXXX XXX"]]);
  });

  it("should give every member of a group the same replacement", () => {
    const { replacementMap, groupCount } = build([
      { type: "PERSON_NAME", text: "John Doe", confidence: 0.95 },
      { type: "PERSON_NAME", text: "john doe", confidence: 0.9 },
    ]);

    expect(groupCount).toBe(1);
    expect(replacementMap.get("John Doe")).toBe("XXXX XXX");
    expect(replacementMap.get("john doe")).toBe("XXXX XXX");
  });

  it("should mask the group from its representative", () => {
    const { replacementMap } = build([
      { type: "PERSON_NAME", text: "Mr. John Doe", confidence: 0.99 },
      { type: "PERSON_NAME", text: "John Doe", confidence: 0.9 },
    ]);

    expect(replacementMap.get("Mr. John Doe")).toBe("XXX XXXX XXX");
    expect(replacementMap.get("John Doe")).toBe("XXX XXXX XXX");
  });

  it("should drop entities below the threshold", () => {
    const result = build([{ type: "PERSON_NAME", text: "John Doe", confidence: 0.5 }]);
    expect(result.replacementMap.size).toBe(0);
    expect(result.entitiesAccepted).toBe(0);
  });

  it("should keep entities exactly at the threshold", () => {
    const { replacementMap } = build([{ type: "EMAIL", text: "a.b@example.org", confidence: 0.85 }]);
    expect(replacementMap.get("a.b@example.org")).toBe("aXX@XXXXXXX.XXX");
  });

  it("should treat a missing confidence as certain", () => {
    const { replacementMap } = build([{ type: "PHONE_NUMBER", text: "555-0100" }], 0.99);
    expect(replacementMap.get("555-0100")).toBe("XXX-XXXX");
  });

  it("should write a consistency entry per normalized value", () => {
    const { consistencyMap } = build([
      { type: "PERSON_NAME", text: "John Doe", confidence: 0.95 },
      { type: "PERSON_NAME", text: "john doe", confidence: 0.9 },
    ]);

    const hash = crypto.createHash("md5").update("PERSON_NAME:john doe").digest("hex");
    expect(consistencyMap.size).toBe(1);
    expect(consistencyMap.get(hash)).toEqual({ entityType: "PERSON_NAME", replacement: "XXXX XXX" });
  });

  it("should use the unknown fallback for unregistered types", () => {
    const { replacementMap } = build([{ type: "MEMBER_ID", text: "M-88210" }]);
    expect(replacementMap.get("M-88210")).toBe("MEM_XXX");
  });

  it("should apply custom maskers", () => {
    const log = createTestLogger();
    const result = buildReplacementMap([{ type: "ACCOUNT_NUMBER", text: "12345678" }], {
      confidenceThreshold: 0.85,
      maskers: createMaskRegistry({ ACCOUNT_NUMBER: () => "[account]" }),
      log,
    });

    expect(result.ok && result.value.replacementMap.get("12345678")).toBe("[account]");
  });
});

// =============================================================================
// Malformed Input
// =============================================================================

describe("malformed entities", () => {
  it("should skip entries without text and keep the rest", () => {
    const log = createTestLogger();
    const { replacementMap } = build(
      [{ type: "PERSON_NAME" }, "John", null, { type: "PERSON_NAME", text: "Jane Roe" }],
      0.85,
      log,
    );

    expect([...replacementMap.keys()]).toEqual(["Jane Roe"]);
    expect(log.warn).toHaveBeenCalledTimes(3);
  });

  it("should skip entries whose text is only whitespace", () => {
    const log = createTestLogger();

    expect(coerceEntity({ type: "PERSON_NAME", text: " \t " }, log)).toBeNull();
    expect(log.warn).toHaveBeenCalledWith("Skipping entity with blank 'text' (type PERSON_NAME)");
  });

  it("should treat a missing type as UNKNOWN", () => {
    const log = createTestLogger();
    const { replacementMap } = build([{ text: "abcdef" }], 0.85, log);

    expect(replacementMap.get("abcdef")).toBe("UNK_XXX");
    expect(log.warn).toHaveBeenCalledWith("Entity has no type, treating as UNKNOWN");
  });

  it("should default a non-numeric confidence to 1.0", () => {
    expect(coerceEntity({ type: "SSN", text: "123-45-6789", confidence: "high" }, createTestLogger())).toEqual({
      type: "SSN",
      text: "123-45-6789",
      confidence: 1.0,
    });
  });

  it("should carry numeric offsets through", () => {
    expect(coerceEntity({ type: "EMAIL", text: "x@y.z", start: 4, end: 9 }, createTestLogger())).toEqual({
      type: "EMAIL",
      text: "x@y.z",
      confidence: 1.0,
      start: 4,
      end: 9,
    });
  });

  it("should isolate a failing group", () => {
    const log = createTestLogger();
    const result = buildReplacementMap(
      [
        { type: "EMAIL", text: "a@example.com" },
        { type: "PERSON_NAME", text: "John Doe" },
      ],
      {
        confidenceThreshold: 0.85,
        maskers: createMaskRegistry({
          EMAIL: () => {
            throw new Error("mask failed");
          },
        }),
        log,
      },
    );

    expect(result.ok && [...result.value.replacementMap]).toEqual([["John Doe", "XXXX XXX"]]);
    expect(log.error).toHaveBeenCalledWith("Error processing entity group 1/2: Error: mask failed");
  });

  it("should return an error result when the builder itself fails", () => {
    const log = createTestLogger();
    log.info.mockImplementation(() => {
      throw new Error("log sink closed");
    });

    const result = buildReplacementMap([{ type: "PERSON_NAME", text: "John Doe" }], {
      confidenceThreshold: 0.85,
      log,
    });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe("log sink closed");
  });
});

describe("computeEntityHash", () => {
  it("should hash equal normalized values identically", () => {
    expect(computeEntityHash("(555) 123-4567", "PHONE_NUMBER")).toBe(
      computeEntityHash("555.123.4567", "PHONE_NUMBER"),
    );
    expect(computeEntityHash("5551234567", "PHONE_NUMBER")).not.toBe(
      computeEntityHash("5551234567", "ACCOUNT_NUMBER"),
    );
  });
});
