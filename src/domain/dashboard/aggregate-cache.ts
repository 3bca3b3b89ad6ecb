import { logDebug } from "../../core/logging.js";
import type { CacheStats, ViewName, ViewResults } from "./types.js";

type ViewMaps = { [K in ViewName]: Map<string, ViewResults[K]> };

function emptyMaps(): ViewMaps {
  return {
    filteredView: new Map(),
    overview: new Map(),
    breakdown: new Map(),
    geographic: new Map(),
    correlations: new Map(),
    correlationMatrix: new Map(),
    leadership: new Map(),
    benchmarks: new Map(),
    incidents: new Map(),
    transparency: new Map(),
    causeAreas: new Map(),
    trends: new Map(),
    topCompanies: new Map(),
  };
}

/**
 * Memoizes view results by (dataset version, filter signature, params).
 *
 * Results are pure functions of their key, so sessions share entries
 * safely. Bounded across all views with least-recently-used eviction.
 * Cached values are handed out as-is; callers must not mutate them.
 */
export class AggregateCache {
  private maps: ViewMaps = emptyMaps();
  /** Insertion order doubles as recency: a hit re-inserts its key. */
  private order = new Map<string, ViewName>();
  private maxEntries: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(maxEntries: number) {
    this.maxEntries = Math.max(1, maxEntries);
  }

  static key(datasetVersion: number, signature: string, params = ""): string {
    return params ? `v${datasetVersion}|${signature}|${params}` : `v${datasetVersion}|${signature}`;
  }

  getOrCompute<K extends ViewName>(
    view: K,
    key: string,
    compute: () => ViewResults[K],
  ): ViewResults[K] {
    const map: Map<string, ViewResults[K]> = this.maps[view];
    const orderKey = `${view}:${key}`;

    const hit = map.get(key);
    if (hit !== undefined) {
      this.hits++;
      this.order.delete(orderKey);
      this.order.set(orderKey, view);
      return hit;
    }

    this.misses++;
    const value = compute();
    map.set(key, value);
    this.order.set(orderKey, view);
    this.evict();
    return value;
  }

  clear(): void {
    this.maps = emptyMaps();
    this.order.clear();
    logDebug("Aggregate cache cleared");
  }

  stats(): CacheStats {
    return {
      entries: this.order.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evict(): void {
    while (this.order.size > this.maxEntries) {
      const oldest = this.order.entries().next();
      if (oldest.done) return;
      const [orderKey, view] = oldest.value;
      this.order.delete(orderKey);
      this.maps[view].delete(orderKey.slice(view.length + 1));
      this.evictions++;
    }
  }
}
