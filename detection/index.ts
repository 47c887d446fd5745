/**
 * PII detection - exports
 */

import type { StatementRedactorConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { LlmDetector } from "./llm-detector.js";
import { createOllamaClient } from "./ollama-client.js";
import { PatternDetector } from "./pattern-detector.js";
import type { DetectorClient, DetectorKind, PiiDetector } from "./types.js";

export { chunkContent } from "./chunking.js";
export {
  LlmDetector,
  anchorEntity,
  buildDetectionPrompt,
  parseDetectionResponse,
  type LlmDetectorOptions,
} from "./llm-detector.js";
export { createOllamaClient, ollamaBaseUrl } from "./ollama-client.js";
export { PatternDetector, detectPatterns, isValidRoutingNumber, resolveOverlaps } from "./pattern-detector.js";
export * from "./types.js";

/**
 * Build the configured detector. The LLM detector talks to Ollama unless a
 * client is supplied.
 */
export function createDetector(
  kind: DetectorKind,
  config: StatementRedactorConfig,
  logger?: Logger,
  client?: DetectorClient,
): PiiDetector {
  if (kind === "pattern") {
    return new PatternDetector(logger);
  }

  return new LlmDetector({
    client: client ?? createOllamaClient(config.ollama),
    model: config.ollama.model,
    fallbackModel: config.ollama.fallbackModel,
    maxChunkSize: config.detection.maxChunkSize,
    overlapSize: config.detection.overlapSize,
    timeoutMs: config.detection.timeoutMs,
    logger,
  });
}
