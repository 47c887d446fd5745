/**
 * Entity grouping
 *
 * Collapses every surface variant of the same real-world value into one
 * equivalence class keyed by `${type}_${normalizedText}`, so the whole class
 * receives a single replacement.
 */

import { normalizeEntityText } from "./normalizer.js";
import type { PIIEntity } from "./types.js";

export type EntityGroups = Map<string, PIIEntity[]>;

export function groupKey(entity: PIIEntity): string {
  return `${entity.type}_${normalizeEntityText(entity.text, entity.type)}`;
}

/**
 * Group entities by type and normalized text. Groups appear in first-seen
 * order and keep their members in input order.
 */
export function groupEntities(entities: readonly PIIEntity[]): EntityGroups {
  const groups: EntityGroups = new Map();

  for (const entity of entities) {
    const key = groupKey(entity);
    const members = groups.get(key);
    if (members) {
      members.push(entity);
    } else {
      groups.set(key, [entity]);
    }
  }

  return groups;
}

/**
 * The highest-confidence member; ties go to the first one seen.
 * A missing confidence ranks as 0.
 */
export function selectRepresentative(members: readonly PIIEntity[]): PIIEntity | undefined {
  let best: PIIEntity | undefined;
  for (const member of members) {
    if (!best || (member.confidence ?? 0) > (best.confidence ?? 0)) {
      best = member;
    }
  }
  return best;
}
