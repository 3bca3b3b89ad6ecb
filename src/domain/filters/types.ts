/** Categorical filter dimensions. Values match case-insensitively. */
export const CATEGORICAL_FILTER_KEYS = [
  "industry",
  "state",
  "region",
  "size",
] as const;
export type CategoricalFilterKey = (typeof CATEGORICAL_FILTER_KEYS)[number];

export const FILTER_KEYS = [
  ...CATEGORICAL_FILTER_KEYS,
  "yearRange",
  "nameContains",
] as const;
export type FilterKey = (typeof FILTER_KEYS)[number];

export interface YearRange {
  from?: number; // inclusive
  to?: number; // inclusive
}

/**
 * A normalized filter set: a conjunction over its present keys.
 * An empty object selects the whole dataset.
 */
export interface FilterSet {
  industry?: string[];
  state?: string[];
  region?: string[];
  size?: string[];
  yearRange?: YearRange;
  nameContains?: string;
}
