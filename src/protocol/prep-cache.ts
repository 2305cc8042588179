/**
 * Bounded FIFO cache of prepared JID components.
 *
 * Stringprep is expensive, so values that have already been prepared are
 * remembered. A cached value is a fixed point of its profile: probing the
 * cache with a raw value tells the normalizer whether that value is already
 * in prepared form.
 */

import type { ComponentKind } from "./types.js";

export class PrepCache {
  readonly capacity: number;

  // A Set iterates in insertion order, so its first element is the oldest.
  private readonly _values = new Set<string>();

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Cache capacity must be a positive integer, got ${capacity}`
      );
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this._values.size;
  }

  /**
   * Add a value. Re-adding a cached value does not change its eviction
   * order. Evicts oldest-inserted values while over capacity.
   */
  put(value: string): void {
    if (this._values.has(value)) {
      return;
    }
    this._values.add(value);
    while (this._values.size > this.capacity) {
      const oldest = this._values.values().next();
      if (oldest.done) {
        break;
      }
      this._values.delete(oldest.value);
    }
  }

  /**
   * Whether `value` is a known prepared value. `null` always is, since
   * preparing null yields null.
   *
   * Lookups do not record access (this is FIFO, not LRU).
   */
  contains(value: string | null): boolean {
    if (value === null) {
      return true;
    }
    return this._values.has(value);
  }

  clear(): void {
    this._values.clear();
  }
}

/** Cache capacities per component kind. */
export type PrepCacheCapacities = Readonly<Record<ComponentKind, number>>;

export const DEFAULT_CACHE_CAPACITIES: PrepCacheCapacities = Object.freeze({
  node: 10000,
  // Far fewer distinct domains than users or sessions.
  domain: 500,
  resource: 10000,
});

/** One cache per component kind. */
export type PrepCaches = Readonly<Record<ComponentKind, PrepCache>>;

export function createPrepCaches(
  capacities: Partial<PrepCacheCapacities> = {}
): PrepCaches {
  return {
    node: new PrepCache(capacities.node ?? DEFAULT_CACHE_CAPACITIES.node),
    domain: new PrepCache(capacities.domain ?? DEFAULT_CACHE_CAPACITIES.domain),
    resource: new PrepCache(
      capacities.resource ?? DEFAULT_CACHE_CAPACITIES.resource
    ),
  };
}
