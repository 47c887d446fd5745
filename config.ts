/**
 * Configuration management
 *
 * Defaults, JSON config file loading, environment overrides and validation.
 */

import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { createLogger, type Logger } from "./logger.js";
import { isRecord } from "./obfuscation/types.js";

// =============================================================================
// Types
// =============================================================================

export type OllamaConfig = {
  host: string;
  model: string;
  fallbackModel: string;
};

export type DetectionConfig = {
  maxChunkSize: number;
  overlapSize: number;
  timeoutMs: number;
};

export type StatementRedactorConfig = {
  confidenceThreshold: number;
  ollama: OllamaConfig;
  detection: DetectionConfig;
  storePath: string;
};

export type PartialConfig = {
  confidenceThreshold?: number;
  ollama?: Partial<OllamaConfig>;
  detection?: Partial<DetectionConfig>;
  storePath?: string;
};

// =============================================================================
// Defaults
// =============================================================================

export const APP_DIR = join(homedir(), ".statement-redactor");
export const DEFAULT_CONFIG_PATH = join(APP_DIR, "config.json");

export const DEFAULT_CONFIG: StatementRedactorConfig = {
  confidenceThreshold: 0.85,
  ollama: {
    host: "http://localhost:11434",
    model: "mistral:7b-instruct",
    fallbackModel: "llama3:8b",
  },
  detection: {
    maxChunkSize: 4000,
    overlapSize: 200,
    timeoutMs: 60000,
  },
  storePath: join(APP_DIR, "audit.db"),
};

export function resolveConfig(config?: PartialConfig): StatementRedactorConfig {
  return {
    confidenceThreshold: config?.confidenceThreshold ?? DEFAULT_CONFIG.confidenceThreshold,
    ollama: {
      host: config?.ollama?.host ?? DEFAULT_CONFIG.ollama.host,
      model: config?.ollama?.model ?? DEFAULT_CONFIG.ollama.model,
      fallbackModel: config?.ollama?.fallbackModel ?? DEFAULT_CONFIG.ollama.fallbackModel,
    },
    detection: {
      maxChunkSize: config?.detection?.maxChunkSize ?? DEFAULT_CONFIG.detection.maxChunkSize,
      overlapSize: config?.detection?.overlapSize ?? DEFAULT_CONFIG.detection.overlapSize,
      timeoutMs: config?.detection?.timeoutMs ?? DEFAULT_CONFIG.detection.timeoutMs,
    },
    storePath: config?.storePath ?? DEFAULT_CONFIG.storePath,
  };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load configuration from a JSON file (when present), then apply environment
 * overrides. A malformed file is reported and ignored.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger,
): StatementRedactorConfig {
  const log = createLogger(logger, "config");
  const path = configPath || DEFAULT_CONFIG_PATH;

  let fileConfig: PartialConfig = {};
  if (existsSync(path)) {
    try {
      const fileContent = readFileSync(path, "utf-8");
      fileConfig = parsePartialConfig(JSON.parse(fileContent));
    } catch (error) {
      log.warn(`Failed to load config from ${path}: ${error}`);
    }
  }

  return applyEnv(resolveConfig(fileConfig), env, log);
}

/**
 * Pick the recognised fields out of an arbitrary JSON value. Fields of the
 * wrong type are dropped so the defaults apply.
 */
export function parsePartialConfig(value: unknown): PartialConfig {
  if (!isRecord(value)) return {};

  const config: PartialConfig = {};
  if (typeof value.confidenceThreshold === "number") {
    config.confidenceThreshold = value.confidenceThreshold;
  }
  if (typeof value.storePath === "string") {
    config.storePath = value.storePath;
  }

  const ollama = value.ollama;
  if (isRecord(ollama)) {
    config.ollama = {};
    if (typeof ollama.host === "string") config.ollama.host = ollama.host;
    if (typeof ollama.model === "string") config.ollama.model = ollama.model;
    if (typeof ollama.fallbackModel === "string") config.ollama.fallbackModel = ollama.fallbackModel;
  }

  const detection = value.detection;
  if (isRecord(detection)) {
    config.detection = {};
    if (typeof detection.maxChunkSize === "number") config.detection.maxChunkSize = detection.maxChunkSize;
    if (typeof detection.overlapSize === "number") config.detection.overlapSize = detection.overlapSize;
    if (typeof detection.timeoutMs === "number") config.detection.timeoutMs = detection.timeoutMs;
  }

  return config;
}

function applyEnv(
  config: StatementRedactorConfig,
  env: NodeJS.ProcessEnv,
  log: Logger,
): StatementRedactorConfig {
  if (env.STATEMENT_REDACTOR_CONFIDENCE_THRESHOLD) {
    const threshold = parseFloat(env.STATEMENT_REDACTOR_CONFIDENCE_THRESHOLD);
    if (Number.isNaN(threshold)) {
      log.warn(
        `Ignoring STATEMENT_REDACTOR_CONFIDENCE_THRESHOLD=${env.STATEMENT_REDACTOR_CONFIDENCE_THRESHOLD} (not a number)`,
      );
    } else {
      config.confidenceThreshold = threshold;
    }
  }

  if (env.OLLAMA_HOST) config.ollama.host = env.OLLAMA_HOST;
  if (env.OLLAMA_MODEL) config.ollama.model = env.OLLAMA_MODEL;
  if (env.STATEMENT_REDACTOR_STORE) config.storePath = env.STATEMENT_REDACTOR_STORE;

  return config;
}

// =============================================================================
// Validation
// =============================================================================

export function validateConfig(config: StatementRedactorConfig): void {
  if (
    Number.isNaN(config.confidenceThreshold) ||
    config.confidenceThreshold < 0 ||
    config.confidenceThreshold > 1
  ) {
    throw new Error(`Invalid confidenceThreshold: ${config.confidenceThreshold} (expected 0-1)`);
  }
  if (!config.ollama.host) {
    throw new Error("ollama.host must not be empty");
  }
  if (!config.ollama.model) {
    throw new Error("ollama.model must not be empty");
  }
  if (config.detection.maxChunkSize <= 0) {
    throw new Error(`Invalid detection.maxChunkSize: ${config.detection.maxChunkSize}`);
  }
  if (config.detection.overlapSize < 0 || config.detection.overlapSize >= config.detection.maxChunkSize) {
    throw new Error(
      `Invalid detection.overlapSize: ${config.detection.overlapSize} (must be below maxChunkSize)`,
    );
  }
  if (config.detection.timeoutMs <= 0) {
    throw new Error(`Invalid detection.timeoutMs: ${config.detection.timeoutMs}`);
  }
}
