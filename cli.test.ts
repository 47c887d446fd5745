/**
 * Command-line tests. Each test works in its own temp directory and points
 * --config at a file that does not exist, so only defaults apply.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import {
  EXIT_DEGRADED,
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  isDirectRun,
  readEntitiesFile,
  runCli,
  type CliIo,
} from "./cli.js";
import { ObfuscationStore } from "./memory/store.js";

const STATEMENT = {
  full_text: "Account Holder: John Doe\nSSN: 123-45-6789",
  metadata: { source: "statement.pdf" },
  text_blocks: [{ text: "Account Holder: John Doe" }],
};

const ENTITIES = [{ type: "PERSON_NAME", text: "John Doe", confidence: 0.95 }];

describe("runCli", () => {
  let dir: string;
  let stdout: string;
  let stderr: string[];
  let io: CliIo;

  function write(name: string, value: unknown): string {
    const file = join(dir, name);
    writeFileSync(file, typeof value === "string" ? value : JSON.stringify(value));
    return file;
  }

  function run(...args: string[]): Promise<number> {
    return runCli([...args, "--config", join(dir, "missing-config.json")], io);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "statement-redactor-cli-"));
    stdout = "";
    stderr = [];
    io = {
      stdout: (text) => {
        stdout += text;
      },
      stderr: (line) => {
        stderr.push(line);
      },
      env: {},
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Usage
  // ===========================================================================

  it("should print help", async () => {
    expect(await runCli(["--help"], io)).toBe(EXIT_OK);
    expect(stdout).toBe(`${USAGE}\n`);
  });

  it("should require a document path", async () => {
    expect(await run()).toBe(EXIT_USAGE);
    expect(stderr).toEqual([
      "[statement-redactor] [cli] Expected exactly one document path, got 0",
      USAGE,
    ]);
  });

  it("should reject an unknown detector", async () => {
    const doc = write("statement.json", STATEMENT);
    expect(await run(doc, "--detect", "regex")).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe("[statement-redactor] [cli] Unknown detector: regex (expected pattern or llm)");
  });

  it("should reject a threshold outside 0-1", async () => {
    const doc = write("statement.json", STATEMENT);
    expect(await run(doc, "--threshold", "2")).toBe(EXIT_USAGE);
    expect(stderr).toEqual(["[statement-redactor] [cli] Invalid confidenceThreshold: 2 (expected 0-1)"]);
  });

  it("should report an unreadable document", async () => {
    expect(await run(join(dir, "nope.json"))).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^\[statement-redactor\] \[cli\] Cannot read document .*nope\.json: /);
  });

  it("should report invalid JSON", async () => {
    const doc = write("statement.json", "{ not json");
    expect(await run(doc)).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^\[statement-redactor\] \[cli\] Invalid JSON in document /);
  });

  // ===========================================================================
  // Obfuscation
  // ===========================================================================

  it("should apply an entities file and write the result to --out", async () => {
    const doc = write("statement.json", STATEMENT);
    const entities = write("entities.json", ENTITIES);
    const out = join(dir, "out.json");

    expect(await run(doc, "--entities", entities, "--out", out)).toBe(EXIT_OK);

    const result = JSON.parse(readFileSync(out, "utf-8"));
    expect(result.full_text).toBe("Account Holder: XXXX XXX\nSSN: 123-45-6789");
    expect(result.text_blocks).toEqual([{ text: "Account Holder: XXXX XXX" }]);
    expect(result.metadata).toMatchObject({ source: "statement.pdf", obfuscated: true, entities_obfuscated: 1 });
    expect(stdout).toBe("");
    expect(stderr).toContain(`[statement-redactor] [cli] Wrote obfuscated document to ${out}`);
  });

  it("should accept entities wrapped in an object", async () => {
    const doc = write("statement.json", STATEMENT);
    const entities = write("entities.json", { entities: ENTITIES });

    expect(await run(doc, "--entities", entities)).toBe(EXIT_OK);
    expect(JSON.parse(stdout).full_text).toBe("Account Holder: XXXX XXX\nSSN: 123-45-6789");
  });

  it("should drop entities below --threshold", async () => {
    const doc = write("statement.json", STATEMENT);
    const entities = write("entities.json", ENTITIES);

    expect(await run(doc, "--entities", entities, "--threshold", "0.99")).toBe(EXIT_OK);
    expect(JSON.parse(stdout).full_text).toBe(STATEMENT.full_text);
  });

  it("should detect entities with the pattern detector by default", async () => {
    const doc = write("statement.json", STATEMENT);

    expect(await run(doc)).toBe(EXIT_OK);
    expect(JSON.parse(stdout).full_text).toBe("Account Holder: XXXX XXX\nSSN: XXX-XX-6789");
  });

  it("should detect entities with the LLM detector", async () => {
    const complete = vi.fn(async () => '{"entities": [{"type": "SSN", "text": "123-45-6789", "confidence": 0.9}]}');
    io.detectorClient = { complete };
    const doc = write("statement.json", STATEMENT);

    expect(await run(doc, "--detect", "llm")).toBe(EXIT_OK);
    expect(JSON.parse(stdout).full_text).toBe("Account Holder: John Doe\nSSN: XXX-XX-6789");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("should exit with the degraded status for a malformed document", async () => {
    const doc = write("statement.json", ["not", "a", "document"]);
    const entities = write("entities.json", ENTITIES);

    expect(await run(doc, "--entities", entities)).toBe(EXIT_DEGRADED);
    const result = JSON.parse(stdout);
    expect(result.metadata.obfuscated).toBe(false);
    expect(result.text_blocks).toEqual([]);
  });

  it("should reject an entities file of the wrong shape", async () => {
    const doc = write("statement.json", STATEMENT);
    const entities = write("entities.json", { items: [] });

    expect(await run(doc, "--entities", entities)).toBe(EXIT_USAGE);
    expect(stdout).toBe("");
  });

  // ===========================================================================
  // Audit
  // ===========================================================================

  it("should record the run when --audit is given", async () => {
    const storePath = join(dir, "audit.db");
    io.env = { STATEMENT_REDACTOR_STORE: storePath };
    const doc = write("statement.json", STATEMENT);
    const entities = write("entities.json", ENTITIES);

    expect(await run(doc, "--entities", entities, "--audit")).toBe(EXIT_OK);

    const store = new ObfuscationStore(storePath, { info: vi.fn(), warn: vi.fn(), error: vi.fn() });
    try {
      const runs = store.getRecentRuns();
      expect(runs).toHaveLength(1);
      expect(runs[0]).toMatchObject({
        documentTitle: "statement.json",
        entitiesReceived: 1,
        entitiesObfuscated: 1,
        degraded: false,
      });
    } finally {
      store.close();
    }
  });
});

describe("readEntitiesFile", () => {
  it("should reject a file that is not JSON", () => {
    const dir = mkdtempSync(join(tmpdir(), "statement-redactor-entities-"));
    try {
      const file = join(dir, "entities.json");
      writeFileSync(file, "PERSON_NAME John Doe");
      expect(() => readEntitiesFile(file)).toThrow(/^Invalid JSON in entities file /);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("isDirectRun", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "statement-redactor-bin-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function script(file: string): string {
    writeFileSync(file, "");
    return file;
  }

  it("should recognise the module through a symlinked bin entry", () => {
    const cli = script(join(dir, "cli.js"));
    const bin = join(dir, "statement-redactor");
    symlinkSync(cli, bin);

    expect(isDirectRun(pathToFileURL(cli).href, bin)).toBe(true);
  });

  it("should recognise a module whose path contains spaces", () => {
    mkdirSync(join(dir, "my tools"));
    const cli = script(join(dir, "my tools", "cli.js"));

    expect(isDirectRun(pathToFileURL(cli).href, cli)).toBe(true);
  });

  it("should be false when another script was started", () => {
    const cli = script(join(dir, "cli.js"));
    const other = script(join(dir, "other.js"));

    expect(isDirectRun(pathToFileURL(cli).href, other)).toBe(false);
    expect(isDirectRun(pathToFileURL(cli).href, join(dir, "missing.js"))).toBe(false);
    expect(isDirectRun(pathToFileURL(cli).href, undefined)).toBe(false);
  });
});
