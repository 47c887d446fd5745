#!/usr/bin/env node
/**
 * statement-redactor command
 *
 * Reads a parsed statement document (JSON), takes PII entities from a file
 * or runs a detector over the full text, and writes the obfuscated document
 * as JSON. Log lines go to stderr so stdout carries only the document.
 *
 * Exit status: 0 success, 1 usage or I/O error, 2 obfuscation degraded.
 */

import { existsSync, readFileSync, realpathSync, writeFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { loadConfig, validateConfig, type StatementRedactorConfig } from "./config.js";
import { createDetector } from "./detection/index.js";
import { DETECTOR_KINDS, type DetectorClient, type DetectorKind } from "./detection/types.js";
import { createLogger, type Logger } from "./logger.js";
import { ObfuscationStore } from "./memory/store.js";
import { Obfuscator, type ObfuscationOutcome } from "./obfuscation/obfuscator.js";
import { describeType, isList, isRecord } from "./obfuscation/types.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_DEGRADED = 2;

export const USAGE = `Usage: statement-redactor <document.json> [options]

Options:
  --entities <file>       PII entities JSON (an array, or { "entities": [...] })
  --detect <kind>         Detector when no entities file is given: pattern (default) or llm
  --threshold <n>         Confidence threshold between 0 and 1 (default 0.85)
  --out <file>            Write the obfuscated document here instead of stdout
  --config <file>         Config file (default ~/.statement-redactor/config.json)
  --audit                 Record the run and consistency map in the audit store
  -h, --help              Show this help`;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  detectorClient?: DetectorClient;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (line) => console.error(line),
  env: process.env,
};

function stderrLogger(io: CliIo): Logger {
  return {
    info: (msg) => io.stderr(msg),
    warn: (msg) => io.stderr(msg),
    error: (msg) => io.stderr(msg),
  };
}

class UsageError extends Error {
  override name = "UsageError";
}

// =============================================================================
// Argument Handling
// =============================================================================

type CliOptions = {
  documentPath: string;
  entitiesPath?: string;
  detect: DetectorKind;
  threshold?: number;
  outPath?: string;
  configPath?: string;
  audit: boolean;
  help: boolean;
};

function isDetectorKind(value: string): value is DetectorKind {
  return DETECTOR_KINDS.some((kind) => kind === value);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      entities: { type: "string" },
      detect: { type: "string" },
      threshold: { type: "string" },
      out: { type: "string" },
      config: { type: "string" },
      audit: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return { documentPath: "", detect: "pattern", audit: false, help: true };
  }

  if (positionals.length !== 1 || positionals[0] === undefined) {
    throw new UsageError(`Expected exactly one document path, got ${positionals.length}`);
  }

  const detect = values.detect ?? "pattern";
  if (!isDetectorKind(detect)) {
    throw new UsageError(`Unknown detector: ${detect} (expected ${DETECTOR_KINDS.join(" or ")})`);
  }

  let threshold: number | undefined;
  if (values.threshold !== undefined) {
    threshold = Number(values.threshold);
    if (values.threshold.trim() === "" || Number.isNaN(threshold)) {
      throw new UsageError(`--threshold must be a number, got ${values.threshold}`);
    }
  }

  return {
    documentPath: positionals[0],
    entitiesPath: values.entities,
    detect,
    threshold,
    outPath: values.out,
    configPath: values.config,
    audit: values.audit ?? false,
    help: false,
  };
}

// =============================================================================
// Input
// =============================================================================

function readJson(filePath: string, what: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new UsageError(`Cannot read ${what} ${filePath}: ${error instanceof Error ? error.message : error}`);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new UsageError(`Invalid JSON in ${what} ${filePath}: ${error instanceof Error ? error.message : error}`);
  }
}

export function readEntitiesFile(filePath: string): unknown[] {
  const parsed = readJson(filePath, "entities file");
  if (isList(parsed)) return parsed;
  if (isRecord(parsed) && isList(parsed.entities)) return parsed.entities;
  throw new UsageError(`Entities file must hold a list or { "entities": [...] }, got ${describeType(parsed)}`);
}

async function resolveEntities(
  options: CliOptions,
  document: unknown,
  config: StatementRedactorConfig,
  io: CliIo,
  logger: Logger,
): Promise<unknown[]> {
  if (options.entitiesPath) {
    return readEntitiesFile(options.entitiesPath);
  }

  const text = isRecord(document) && typeof document.full_text === "string" ? document.full_text : "";
  const detector = createDetector(options.detect, config, logger, io.detectorClient);
  const result = await detector.detect(text);
  return result.entities;
}

// =============================================================================
// Audit
// =============================================================================

function recordRun(
  config: StatementRedactorConfig,
  documentPath: string,
  outcome: ObfuscationOutcome,
  logger: Logger,
): void {
  const store = new ObfuscationStore(config.storePath, createLogger(logger, "store"));
  try {
    const { report } = outcome;
    store.logRun({
      documentTitle: path.basename(documentPath),
      entitiesReceived: report.entitiesReceived,
      entitiesObfuscated: report.replacementMap.size,
      integrityVerified: report.integrity.verified,
      degraded: report.degraded,
      error: report.error,
      durationMs: report.durationMs,
    });
    if (!report.degraded) {
      store.saveConsistencyMap(report.consistencyMap);
    }
  } finally {
    store.close();
  }
}

// =============================================================================
// Main
// =============================================================================

export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const logger = stderrLogger(io);
  const log = createLogger(logger, "cli");

  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout(`${USAGE}\n`);
      return EXIT_OK;
    }

    const config = loadConfig(options.configPath, io.env, logger);
    if (options.threshold !== undefined) {
      config.confidenceThreshold = options.threshold;
    }
    validateConfig(config);

    const document = readJson(options.documentPath, "document");
    const entities = await resolveEntities(options, document, config, io, logger);

    const obfuscator = new Obfuscator({ confidenceThreshold: config.confidenceThreshold, logger });
    const outcome = obfuscator.obfuscateWithReport(document, entities);

    const output = `${JSON.stringify(outcome.document, null, 2)}\n`;
    if (options.outPath) {
      writeFileSync(options.outPath, output, "utf-8");
      log.info(`Wrote obfuscated document to ${options.outPath}`);
    } else {
      io.stdout(output);
    }

    if (options.audit) {
      recordRun(config, options.documentPath, outcome, logger);
    }

    if (outcome.report.degraded) {
      log.warn(`Obfuscation degraded: ${outcome.report.error ?? "unknown error"}`);
      return EXIT_DEGRADED;
    }
    return EXIT_OK;
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    if (error instanceof UsageError) {
      io.stderr(USAGE);
    }
    return EXIT_USAGE;
  }
}

/**
 * True when `scriptPath` (argv[1]) resolves to the module at `moduleUrl`.
 * The installed bin entry is a symlink, so both sides are resolved to their
 * real paths before comparing.
 */
export function isDirectRun(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath || !existsSync(scriptPath)) return false;
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

// Run if executed directly
if (isDirectRun(import.meta.url, process.argv[1])) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_USAGE;
    },
  );
}
