import { FilterConfigError } from "../../core/errors.js";
import { regionForState } from "../dataset/regions.js";
import type {
  Company,
  FilteredView,
  HistoryRecord,
  Incident,
} from "../dataset/types.js";
import {
  CATEGORICAL_FILTER_KEYS,
  FILTER_KEYS,
  type CategoricalFilterKey,
  type FilterKey,
  type FilterSet,
  type YearRange,
} from "./types.js";

// ============================================================================
// Parsing
// ============================================================================

function isFilterKey(key: string): key is FilterKey {
  return FILTER_KEYS.some((k) => k === key);
}

function isCategoricalKey(key: string): key is CategoricalFilterKey {
  return CATEGORICAL_FILTER_KEYS.some((k) => k === key);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseCategorical(key: string, value: unknown): string[] {
  const items = typeof value === "string" ? [value] : value;
  if (!Array.isArray(items)) {
    throw new FilterConfigError(
      key,
      `Filter "${key}" must be a string or an array of strings`,
    );
  }
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    if (typeof item !== "string") {
      throw new FilterConfigError(
        key,
        `Filter "${key}" must contain only strings`,
      );
    }
    const trimmed = item.trim();
    if (!trimmed || seen.has(trimmed.toUpperCase())) continue;
    seen.add(trimmed.toUpperCase());
    result.push(trimmed);
  }
  return result;
}

function parseYearBound(key: string, value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new FilterConfigError(key, `Filter "${key}" bounds must be integers`);
  }
  return value;
}

function parseYearRange(value: unknown): YearRange | undefined {
  if (!isPlainObject(value)) {
    throw new FilterConfigError(
      "yearRange",
      'Filter "yearRange" must be an object like { "from": 2020, "to": 2023 }',
    );
  }
  for (const k of Object.keys(value)) {
    if (k !== "from" && k !== "to") {
      throw new FilterConfigError(
        "yearRange",
        `Unknown yearRange field "${k}". Allowed: from, to`,
      );
    }
  }
  const from = parseYearBound("yearRange", value.from);
  const to = parseYearBound("yearRange", value.to);
  if (from !== undefined && to !== undefined && from > to) {
    throw new FilterConfigError(
      "yearRange",
      `yearRange.from (${from}) is after yearRange.to (${to})`,
    );
  }
  if (from === undefined && to === undefined) return undefined;
  const range: YearRange = {};
  if (from !== undefined) range.from = from;
  if (to !== undefined) range.to = to;
  return range;
}

/**
 * Validates and normalizes a raw filter mapping.
 *
 * Unknown keys and values of the wrong shape raise FilterConfigError.
 * Empty lists and blank strings drop the key, so `{ industry: [] }`
 * selects everything, the same as `{}`.
 */
export function parseFilterSet(raw: unknown): FilterSet {
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) {
    throw new FilterConfigError("filters", "Filters must be an object");
  }

  const filters: FilterSet = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isFilterKey(key)) {
      throw new FilterConfigError(
        key,
        `Unknown filter key "${key}". Allowed: ${FILTER_KEYS.join(", ")}`,
      );
    }
    if (value === undefined || value === null) continue;

    if (isCategoricalKey(key)) {
      const values = parseCategorical(key, value);
      if (values.length > 0) filters[key] = values;
    } else if (key === "yearRange") {
      const range = parseYearRange(value);
      if (range) filters.yearRange = range;
    } else {
      if (typeof value !== "string") {
        throw new FilterConfigError(key, `Filter "${key}" must be a string`);
      }
      const trimmed = value.trim();
      if (trimmed) filters.nameContains = trimmed;
    }
  }
  return filters;
}

// ============================================================================
// Signature
// ============================================================================

// Separators of the signature and of the cache key built on it.
const RESERVED = /[%,;=|]/g;

function escapeValue(value: string): string {
  return value.replace(RESERVED, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Canonical string for a filter set. Two sets selecting the same records
 * by the same rules produce the same signature regardless of key order,
 * value order, duplicates or letter case.
 */
export function filterSignature(filters: FilterSet): string {
  const parts: string[] = [];
  for (const key of [...FILTER_KEYS].sort()) {
    if (isCategoricalKey(key)) {
      const values = filters[key];
      if (!values || values.length === 0) continue;
      const canonical = [...new Set(values.map((v) => v.trim().toUpperCase()))]
        .filter(Boolean)
        .sort();
      if (canonical.length > 0) parts.push(`${key}=${canonical.map(escapeValue).join(",")}`);
    } else if (key === "yearRange") {
      const range = filters.yearRange;
      if (!range || (range.from === undefined && range.to === undefined)) {
        continue;
      }
      parts.push(`yearRange=${range.from ?? ""}..${range.to ?? ""}`);
    } else {
      const needle = filters.nameContains?.trim().toLowerCase();
      if (needle) parts.push(`nameContains=${escapeValue(needle)}`);
    }
  }
  return parts.length > 0 ? parts.join(";") : "*";
}

// ============================================================================
// Application
// ============================================================================

function upperSet(values: string[] | undefined): Set<string> | null {
  return values && values.length > 0
    ? new Set(values.map((v) => v.toUpperCase()))
    : null;
}

function inRange(year: number, range: YearRange | undefined): boolean {
  if (!range) return true;
  if (range.from !== undefined && year < range.from) return false;
  if (range.to !== undefined && year > range.to) return false;
  return true;
}

function matchesCategory(value: string | null, allowed: Set<string> | null): boolean {
  if (!allowed) return true;
  return value !== null && allowed.has(value.toUpperCase());
}

/** Builds the company predicate for a filter set. */
export function companyMatcher(filters: FilterSet): (c: Company) => boolean {
  const industry = upperSet(filters.industry);
  const state = upperSet(filters.state);
  const region = upperSet(filters.region);
  const size = upperSet(filters.size);
  const needle = filters.nameContains?.toLowerCase();
  const range = filters.yearRange;

  return (c) =>
    matchesCategory(c.industry, industry) &&
    matchesCategory(c.state, state) &&
    matchesCategory(c.region, region) &&
    matchesCategory(c.size, size) &&
    (!needle || c.name.toLowerCase().includes(needle)) &&
    (!range || c.years.some((y) => inRange(y, range)));
}

interface FilterableData {
  companies: readonly Company[];
  incidents: readonly Incident[];
  history: readonly HistoryRecord[];
}

/**
 * Applies a filter set as a conjunction. Pure: the input arrays are never
 * mutated, and the same inputs always yield the same view.
 *
 * Named incidents and history records follow their company (and the year
 * range). Anonymized incidents only answer to location and year filters;
 * any company-attribute filter drops them.
 */
export function applyFilters(data: FilterableData, filters: FilterSet): FilteredView {
  const matches = companyMatcher(filters);
  const companies = data.companies.filter(matches);
  const kept = new Set(companies.map((c) => c.name));
  const range = filters.yearRange;

  const state = upperSet(filters.state);
  const region = upperSet(filters.region);
  const hasCompanyAttributeFilter = Boolean(
    filters.industry?.length || filters.size?.length || filters.nameContains,
  );

  const incidents = data.incidents.filter((i) => {
    if (i.year !== null && !inRange(i.year, range)) return false;
    if (i.companyName !== null) return kept.has(i.companyName);
    if (hasCompanyAttributeFilter) return false;
    return (
      matchesCategory(i.state, state) &&
      matchesCategory(regionForState(i.state), region)
    );
  });

  const history = data.history.filter(
    (h) => kept.has(h.companyName) && inRange(h.year, range),
  );

  return { companies, incidents, history };
}
