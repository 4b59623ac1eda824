/**
 * Re-keys an aggregated view by the value of one aggregate field
 *
 * Index uniqueness is the caller's concern: when two entities share an index
 * value, the one iterated last wins.
 */

import type { Aggregate, EntityId, IndexKey } from "./types.js";
import { isNullValue } from "./nulls.js";
import { isScalar } from "./values.js";
import { logger } from "./observability/logs.js";

/**
 * A keyed view plus the entity each key was taken from
 */
export interface IndexedView<A> {
  view: ReadonlyMap<IndexKey, A>;
  /** Index key → entity id; empty when the view is keyed by entity id */
  entityIds: ReadonlyMap<IndexKey, EntityId>;
}

const BY_ENTITY_ID: ReadonlyMap<IndexKey, EntityId> = new Map();

/**
 * Key an aggregated view by `field`, or by entity id when no field is given.
 * Entities whose value at `field` is null or a collection are left out.
 */
export function indexView<A extends Aggregate>(
  aggregated: ReadonlyMap<EntityId, A>,
  field: string | undefined
): IndexedView<A> {
  if (field === undefined) return { view: aggregated, entityIds: BY_ENTITY_ID };

  const view = new Map<IndexKey, A>();
  const entityIds = new Map<IndexKey, EntityId>();
  for (const [entity, value] of aggregated) {
    const key = value[field];

    if (!isScalar(key)) {
      if (!isNullValue(key) && logger.debugEnabled) {
        logger.debug("index.skip", {
          entity,
          field,
          message: "index value is not a scalar",
        });
      }
      continue;
    }

    const previous = entityIds.get(key);
    if (previous !== undefined && logger.debugEnabled) {
      logger.debug("index.collision", {
        entity,
        field,
        message: `index key ${String(key)} already taken by ${previous}; replacing`,
      });
    }
    view.set(key, value);
    entityIds.set(key, entity);
  }

  return { view, entityIds };
}
