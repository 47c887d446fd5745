/**
 * Type definitions for PII detectors
 */

import type { PIIEntity } from "../obfuscation/types.js";

// =============================================================================
// Detector Contract
// =============================================================================

export type DetectionResult = {
  entities: PIIEntity[];
  chunksAnalyzed: number;
};

export type PiiDetector = {
  readonly name: string;
  detect(text: string): Promise<DetectionResult>;
};

export type DetectorKind = "pattern" | "llm";

export const DETECTOR_KINDS: readonly DetectorKind[] = ["pattern", "llm"];

// =============================================================================
// Chunking
// =============================================================================

export type ChunkInfo = {
  index: number;
  total: number;
  content: string;
  startOffset: number;
  endOffset: number;
};

// =============================================================================
// LLM Client
// =============================================================================

export type CompletionOptions = {
  model: string;
  signal?: AbortSignal;
};

/**
 * Minimal completion surface the LLM detector needs. The default
 * implementation talks to Ollama; tests hand in a fake.
 */
export type DetectorClient = {
  complete(prompt: string, options: CompletionOptions): Promise<string | null>;
};
