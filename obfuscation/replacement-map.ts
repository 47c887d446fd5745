/**
 * Replacement map builder
 *
 * Confidence-filters detected entities, groups them into equivalence
 * classes, masks each class once from its representative and writes the
 * replacement for every member's surface text.
 */

import crypto from "node:crypto";
import { groupEntities, selectRepresentative } from "./grouper.js";
import { DEFAULT_MASKERS, maskEntityText, type MaskRegistry } from "./maskers.js";
import { normalizeEntityText } from "./normalizer.js";
import {
  type ConsistencyMap,
  type EntityType,
  type PIIEntity,
  type ReplacementMap,
  type Result,
  UNKNOWN_ENTITY_TYPE,
  describeType,
  err,
  isRecord,
  ok,
} from "./types.js";
import type { Logger } from "../logger.js";

export type ReplacementMapOptions = {
  confidenceThreshold: number;
  maskers?: MaskRegistry;
  log: Logger;
};

export type ReplacementMapResult = {
  replacementMap: ReplacementMap;
  consistencyMap: ConsistencyMap;
  entitiesAccepted: number;
  groupCount: number;
};

// =============================================================================
// Entity Coercion
// =============================================================================

/**
 * Read one detector record into a PIIEntity. Records without text, or with
 * only whitespace, are skipped; a missing type becomes UNKNOWN; a missing or non-numeric
 * confidence becomes 1.0 so the entity is always kept.
 */
export function coerceEntity(value: unknown, log: Logger): PIIEntity | null {
  if (!isRecord(value)) {
    log.warn(`Skipping entity that is not an object: ${describeType(value)}`);
    return null;
  }

  if (typeof value.text !== "string") {
    log.warn(`Skipping entity without 'text' (type ${String(value.type ?? UNKNOWN_ENTITY_TYPE)})`);
    return null;
  }

  if (!value.text.trim()) {
    log.warn(`Skipping entity with blank 'text' (type ${String(value.type ?? UNKNOWN_ENTITY_TYPE)})`);
    return null;
  }

  let type: EntityType = UNKNOWN_ENTITY_TYPE;
  if (typeof value.type === "string" && value.type) {
    type = value.type;
  } else {
    log.warn(`Entity has no type, treating as ${UNKNOWN_ENTITY_TYPE}`);
  }

  let confidence = 1.0;
  if (value.confidence !== undefined) {
    if (typeof value.confidence === "number" && !Number.isNaN(value.confidence)) {
      confidence = value.confidence;
    } else {
      log.warn(`Confidence is not a number (${describeType(value.confidence)}), using 1.0`);
    }
  }

  const entity: PIIEntity = { type, text: value.text, confidence };
  if (typeof value.start === "number") entity.start = value.start;
  if (typeof value.end === "number") entity.end = value.end;
  return entity;
}

export function computeEntityHash(text: string, type: EntityType): string {
  const normalized = normalizeEntityText(text, type);
  return crypto.createHash("md5").update(`${type}:${normalized}`).digest("hex");
}

// =============================================================================
// Builder
// =============================================================================

export function buildReplacementMap(
  entities: readonly unknown[],
  options: ReplacementMapOptions,
): Result<ReplacementMapResult> {
  const { confidenceThreshold, log } = options;
  const maskers = options.maskers ?? DEFAULT_MASKERS;

  try {
    const accepted: PIIEntity[] = [];
    for (const value of entities) {
      const entity = coerceEntity(value, log);
      if (entity && (entity.confidence ?? 1.0) >= confidenceThreshold) {
        accepted.push(entity);
      }
    }
    log.info(
      `Filtered ${entities.length} entities to ${accepted.length} at confidence threshold ${confidenceThreshold}`,
    );

    const groups = groupEntities(accepted);
    const replacementMap: ReplacementMap = new Map();
    const consistencyMap: ConsistencyMap = new Map();

    let groupIndex = 0;
    for (const members of groups.values()) {
      groupIndex++;
      try {
        const representative = selectRepresentative(members);
        if (!representative) continue;

        const entityType = representative.type;
        const replacement = maskEntityText(representative.text, entityType, maskers);

        for (const member of members) {
          replacementMap.set(member.text, replacement);

          try {
            const hash = computeEntityHash(member.text, entityType);
            consistencyMap.set(hash, { entityType, replacement });
          } catch (hashError) {
            log.error(`Error computing entity hash: ${hashError}`);
          }
        }
      } catch (groupError) {
        log.error(`Error processing entity group ${groupIndex}/${groups.size}: ${groupError}`);
      }
    }

    log.info(`Built replacement map with ${replacementMap.size} entries from ${groups.size} groups`);
    return ok({
      replacementMap,
      consistencyMap,
      entitiesAccepted: accepted.length,
      groupCount: groups.size,
    });
  } catch (error) {
    log.error(`Error building replacement map: ${error}`);
    return err(error);
  }
}
