/**
 * LLM-backed PII detector
 *
 * Asks a local model (Ollama by default) to list the PII in each chunk of
 * statement text as JSON. Chunks are analyzed sequentially; a failed chunk
 * is logged and skipped.
 */

import { DEFAULT_CONFIG } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { type PIIEntity, isList, isRecord } from "../obfuscation/types.js";
import { chunkContent } from "./chunking.js";
import type { ChunkInfo, DetectionResult, DetectorClient, PiiDetector } from "./types.js";

export type LlmDetectorOptions = {
  client: DetectorClient;
  model?: string;
  fallbackModel?: string;
  maxChunkSize?: number;
  overlapSize?: number;
  timeoutMs?: number;
  // Extra hints appended to the prompt, e.g. the bank's name
  context?: Readonly<Record<string, string>>;
  logger?: Logger;
};

// =============================================================================
// Detection Prompt
// =============================================================================

export function buildDetectionPrompt(
  text: string,
  context: Readonly<Record<string, string>> = {},
): string {
  let prompt = `You are a PII (Personally Identifiable Information) detection system specialized in bank statements.

Find EVERY piece of PII in the bank statement text below. For each one report:
1. Its type: PERSON_NAME, ADDRESS, ACCOUNT_NUMBER, ROUTING_NUMBER, PHONE_NUMBER, EMAIL, ORGANIZATION_NAME, CREDIT_CARD_NUMBER, SSN, DATE_OF_BIRTH, IP_ADDRESS or URL
2. The exact text as it appears
3. Its start and end character positions in the text
4. Your confidence from 0.0 to 1.0

## Response Format

Return ONLY valid JSON:

{
  "entities": [
    {"type": "PERSON_NAME", "text": "John Doe", "start": 10, "end": 18, "confidence": 0.95},
    {"type": "ACCOUNT_NUMBER", "text": "1234567890", "start": 42, "end": 52, "confidence": 0.98}
  ]
}

Report actual PII only. Do not include transaction amounts, balances, transaction dates or other non-PII information.
If there is no PII, return {"entities": []}
`;

  const contextEntries = Object.entries(context);
  if (contextEntries.length > 0) {
    prompt += "\nAdditional context for detection:\n";
    for (const [key, value] of contextEntries) {
      prompt += `${key}: ${value}\n`;
    }
  }

  prompt += `\nBank statement text:\n${text}`;
  return prompt;
}

// =============================================================================
// JSON Parsing
// =============================================================================

function readEntity(value: unknown): PIIEntity | null {
  if (!isRecord(value)) return null;
  if (typeof value.type !== "string" || typeof value.text !== "string" || !value.text) {
    return null;
  }

  const entity: PIIEntity = { type: value.type, text: value.text };
  if (typeof value.start === "number") entity.start = value.start;
  if (typeof value.end === "number") entity.end = value.end;
  if (typeof value.confidence === "number") entity.confidence = value.confidence;
  return entity;
}

/**
 * Pull the entity list out of a model response. Markdown fences and prose
 * around the JSON object are tolerated; malformed entries are dropped.
 */
export function parseDetectionResponse(content: string, log: Logger): PIIEntity[] {
  let jsonStr = content.trim();

  // Remove markdown code fences if present
  const fenced = jsonStr.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced?.[1] !== undefined) {
    jsonStr = fenced[1].trim();
  }

  const objectMatch = jsonStr.match(/\{[\s\S]*\}/);
  if (!objectMatch) {
    log.warn("No JSON found in detector response");
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(objectMatch[0]);
  } catch (error) {
    // Response text is not logged: it echoes statement content
    log.warn(`Failed to parse detector response (${content.length} chars): ${error}`);
    return [];
  }

  if (!isRecord(parsed) || !isList(parsed.entities)) {
    log.warn("Detector response has no 'entities' list");
    return [];
  }

  const entities: PIIEntity[] = [];
  for (const value of parsed.entities) {
    const entity = readEntity(value);
    if (entity) {
      entities.push(entity);
    } else {
      log.debug?.("Dropping malformed entity from detector response");
    }
  }
  return entities;
}

// =============================================================================
// Offsets
// =============================================================================

/**
 * Map chunk-local offsets to document offsets. Models often miscount, so
 * an offset that does not point at the entity text is replaced by the
 * first occurrence in the chunk; entities not found at all lose their
 * offsets.
 */
export function anchorEntity(entity: PIIEntity, chunk: ChunkInfo): PIIEntity {
  let localStart = entity.start;
  if (
    localStart === undefined ||
    chunk.content.slice(localStart, localStart + entity.text.length) !== entity.text
  ) {
    const found = chunk.content.indexOf(entity.text);
    localStart = found >= 0 ? found : undefined;
  }

  const anchored: PIIEntity = { type: entity.type, text: entity.text };
  if (localStart !== undefined) {
    anchored.start = chunk.startOffset + localStart;
    anchored.end = anchored.start + entity.text.length;
  }
  if (entity.confidence !== undefined) anchored.confidence = entity.confidence;
  return anchored;
}

// Chunks overlap, so the same span can be reported twice
function dedupeEntities(entities: readonly PIIEntity[]): PIIEntity[] {
  const seen = new Set<string>();
  const unique: PIIEntity[] = [];
  for (const entity of entities) {
    const key = `${entity.type}|${entity.text}|${entity.start ?? ""}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(entity);
  }
  return unique;
}

// =============================================================================
// Detector
// =============================================================================

export class LlmDetector implements PiiDetector {
  readonly name = "llm";
  private readonly client: DetectorClient;
  private readonly model: string;
  private readonly fallbackModel: string | undefined;
  private readonly maxChunkSize: number;
  private readonly overlapSize: number;
  private readonly timeoutMs: number;
  private readonly context: Readonly<Record<string, string>>;
  private readonly log: Logger;

  constructor(options: LlmDetectorOptions) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_CONFIG.ollama.model;
    this.fallbackModel = options.fallbackModel;
    this.maxChunkSize = options.maxChunkSize ?? DEFAULT_CONFIG.detection.maxChunkSize;
    this.overlapSize = options.overlapSize ?? DEFAULT_CONFIG.detection.overlapSize;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.detection.timeoutMs;
    this.context = options.context ?? {};
    this.log = createLogger(options.logger, "llm-detector");

    this.log.info(`Initialized LLM detector with model: ${this.model}`);
  }

  async detect(text: string): Promise<DetectionResult> {
    const startTime = Date.now();
    const chunks = chunkContent(text, this.maxChunkSize, this.overlapSize);
    this.log.info(`Analyzing statement text: ${text.length} chars in ${chunks.length} chunk(s)`);

    const found: PIIEntity[] = [];
    for (const chunk of chunks) {
      this.log.debug?.(`Analyzing chunk ${chunk.index + 1}/${chunk.total}`);

      try {
        const entities = await this.analyzeChunk(chunk);
        found.push(...entities.map((entity) => anchorEntity(entity, chunk)));
      } catch (error) {
        this.log.error(`Chunk ${chunk.index + 1} analysis failed: ${error}`);
      }
    }

    const entities = dedupeEntities(found);
    this.log.info(`Detected ${entities.length} PII entities in ${Date.now() - startTime}ms`);
    return { entities, chunksAnalyzed: chunks.length };
  }

  private async analyzeChunk(chunk: ChunkInfo): Promise<PIIEntity[]> {
    const prompt = buildDetectionPrompt(chunk.content, this.context);
    const content = await this.complete(prompt);
    if (!content) {
      this.log.warn("Empty LLM response");
      return [];
    }
    return parseDetectionResponse(content, this.log);
  }

  /**
   * One request with a timeout. When the primary model errors (rather than
   * timing out), the fallback model gets a single retry.
   */
  private async complete(prompt: string): Promise<string | null> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      try {
        return await this.client.complete(prompt, { model: this.model, signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted || !this.fallbackModel || this.fallbackModel === this.model) {
          throw error;
        }
        this.log.warn(`Model ${this.model} failed (${error}), retrying with ${this.fallbackModel}`);
        return await this.client.complete(prompt, {
          model: this.fallbackModel,
          signal: controller.signal,
        });
      }
    } catch (error) {
      if (controller.signal.aborted) {
        this.log.warn("Chunk analysis timed out");
        return null;
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
