/**
 * Entity review session
 *
 * Holds detected entities while a person checks them before masking: each
 * entity gets a stable id and a preview of its replacement, and can be
 * corrected, added or dropped.
 */

import { DEFAULT_CONFIG } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { DEFAULT_MASKERS, createMaskRegistry, maskEntityText, type MaskGenerator, type MaskRegistry } from "../obfuscation/maskers.js";
import { buildReplacementMap, coerceEntity } from "../obfuscation/replacement-map.js";
import { type EntityType, type PIIEntity, type ReplacementMap, UNKNOWN_ENTITY_TYPE } from "../obfuscation/types.js";

export type ReviewedEntity = {
  id: string;
  type: EntityType;
  text: string;
  start?: number;
  end?: number;
  confidence: number;
  replacement: string;
};

export type NewEntity = {
  type?: EntityType;
  text: string;
  start?: number;
  end?: number;
  confidence?: number;
};

export type EntityChanges = Partial<Pick<ReviewedEntity, "type" | "text" | "start" | "end" | "confidence">>;

export type EntityReviewOptions = {
  confidenceThreshold?: number;
  maskers?: Readonly<Record<string, MaskGenerator>>;
  logger?: Logger;
};

export class EntityReview {
  private readonly confidenceThreshold: number;
  private readonly maskers: MaskRegistry;
  private readonly log: Logger;
  private entities: ReviewedEntity[] = [];
  private nextId = 0;

  constructor(options: EntityReviewOptions = {}) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIG.confidenceThreshold;
    this.maskers = options.maskers ? createMaskRegistry(options.maskers) : DEFAULT_MASKERS;
    this.log = createLogger(options.logger, "review");
  }

  /**
   * Replace the session contents with detector output. Entities below the
   * confidence threshold are left out; ids restart at `entity_0`.
   */
  load(detected: readonly unknown[]): ReviewedEntity[] {
    this.entities = [];
    this.nextId = 0;

    for (const value of detected) {
      const entity = coerceEntity(value, this.log);
      if (!entity || (entity.confidence ?? 1.0) < this.confidenceThreshold) continue;
      this.entities.push(this.review(entity));
    }

    this.log.info(`Loaded ${this.entities.length} of ${detected.length} PII entities for review`);
    return this.list();
  }

  add(entity: NewEntity): string {
    const reviewed = this.review({ ...entity, type: entity.type ?? UNKNOWN_ENTITY_TYPE });
    this.entities.push(reviewed);
    this.log.info(`Added PII entity: ${reviewed.id}`);
    return reviewed.id;
  }

  update(id: string, changes: EntityChanges): boolean {
    const entity = this.entities.find((e) => e.id === id);
    if (!entity) {
      this.log.warn(`PII entity not found: ${id}`);
      return false;
    }

    if (changes.type !== undefined) entity.type = changes.type;
    if (changes.text !== undefined) entity.text = changes.text;
    if (changes.start !== undefined) entity.start = changes.start;
    if (changes.end !== undefined) entity.end = changes.end;
    if (changes.confidence !== undefined) entity.confidence = changes.confidence;

    if (changes.type !== undefined || changes.text !== undefined) {
      entity.replacement = maskEntityText(entity.text, entity.type, this.maskers);
    }

    this.log.info(`Updated PII entity: ${id}`);
    return true;
  }

  remove(id: string): boolean {
    const index = this.entities.findIndex((e) => e.id === id);
    if (index < 0) {
      this.log.warn(`PII entity not found: ${id}`);
      return false;
    }

    this.entities.splice(index, 1);
    this.log.info(`Removed PII entity: ${id}`);
    return true;
  }

  get(id: string): ReviewedEntity | undefined {
    const entity = this.entities.find((e) => e.id === id);
    return entity ? { ...entity } : undefined;
  }

  list(): ReviewedEntity[] {
    return this.entities.map((entity) => ({ ...entity }));
  }

  /** Reviewed entities in the shape `Obfuscator.obfuscate` takes. */
  toEntities(): PIIEntity[] {
    return this.entities.map(({ type, text, start, end, confidence }) => {
      const entity: PIIEntity = { type, text, confidence };
      if (start !== undefined) entity.start = start;
      if (end !== undefined) entity.end = end;
      return entity;
    });
  }

  /**
   * The map obfuscation will apply. Unlike the per-entity `replacement`
   * previews, variants of one value share their group's replacement here.
   */
  previewMap(): ReplacementMap {
    const built = buildReplacementMap(this.toEntities(), {
      confidenceThreshold: 0,
      maskers: this.maskers,
      log: this.log,
    });
    if (!built.ok) {
      this.log.error(`Could not build preview map: ${built.error.message}`);
      return new Map();
    }
    return built.value.replacementMap;
  }

  private review(entity: PIIEntity): ReviewedEntity {
    const reviewed: ReviewedEntity = {
      id: `entity_${this.nextId++}`,
      type: entity.type,
      text: entity.text,
      confidence: entity.confidence ?? 1.0,
      replacement: maskEntityText(entity.text, entity.type, this.maskers),
    };
    if (entity.start !== undefined) reviewed.start = entity.start;
    if (entity.end !== undefined) reviewed.end = entity.end;
    return reviewed;
  }
}
