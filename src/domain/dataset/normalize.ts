import {
  REPORTING_LEVELS,
  SIZE_CATEGORIES,
  type ReportingLevel,
  type SizeCategory,
} from "./types.js";

// ============================================================================
// Header normalization
// ============================================================================

/** "Environmental Giving ($M)" → "environmental_giving_m" */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Unit markers a header may carry after its alias ("revenue_millions"). */
export const UNIT_SUFFIXES = ["m", "mm", "musd", "usd", "millions", "million", "score"] as const;

const UNIT_SUFFIX = new RegExp(`_(${UNIT_SUFFIXES.join("|")})$`);

/**
 * Picks the first alias present in a normalized row. A header carrying a unit
 * suffix ("revenue_millions") also answers to its bare alias ("revenue").
 */
export function pick(row: Record<string, string>, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const v = row[alias];
    if (v !== undefined && v !== "") return v;
  }
  for (const [key, v] of Object.entries(row)) {
    if (v === "") continue;
    const bare = key.replace(UNIT_SUFFIX, "");
    if (bare !== key && aliases.includes(bare)) return v;
  }
  return undefined;
}

/** Lower-cases headers and drops blank cells' surrounding whitespace. */
export function normalizeRow(raw: Record<string, unknown>): Record<string, string> {
  const row: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const k = normalizeHeader(key);
    if (!k || k in row) continue;
    row[k] = typeof value === "string" ? value.trim() : value == null ? "" : String(value);
  }
  return row;
}

// ============================================================================
// Value parsing
// ============================================================================

const NA_VALUES = new Set(["", "na", "n/a", "null", "none", "-", "--", "unknown"]);

export function isMissing(raw: string | undefined): boolean {
  return raw === undefined || NA_VALUES.has(raw.trim().toLowerCase());
}

/**
 * Parses "$1,234.5", "12%", "(300)" and plain numbers. Returns NaN for text
 * that is not a number, undefined for a missing cell.
 */
export function parseAmount(raw: string | undefined): number | undefined {
  if (isMissing(raw) || raw === undefined) return undefined;
  let s = raw.trim().replace(/[$,\s]/g, "").replace(/%$/, "");
  let sign = 1;
  if (/^\(.*\)$/.test(s)) {
    sign = -1;
    s = s.slice(1, -1);
  }
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(s)) return NaN;
  return sign * Number(s);
}

export function parseBoolean(raw: string | undefined): boolean | undefined {
  if (isMissing(raw) || raw === undefined) return undefined;
  const s = raw.trim().toLowerCase();
  if (["true", "yes", "y", "1", "t"].includes(s)) return true;
  if (["false", "no", "n", "0", "f"].includes(s)) return false;
  return undefined;
}

/** "2021", "2020;2021", "2020|2022" or "2020, 2021". Null when any part is not a year. */
export function parseYears(raw: string | undefined): number[] | null {
  if (isMissing(raw) || raw === undefined) return null;
  const parts = raw.split(/[;|,]/).map((p) => p.trim()).filter(Boolean);
  const years: number[] = [];
  for (const p of parts) {
    // accept "2021", "2021.0" and ISO dates
    const m = /^(\d{4})(\.0+|-\d{2}-\d{2}.*)?$/.exec(p);
    if (!m) return null;
    const year = Number(m[1]);
    if (year < 1900 || year > 2100) return null;
    years.push(year);
  }
  return years.length > 0 ? [...new Set(years)].sort((a, b) => a - b) : null;
}

const SEVERITY_WORDS: Record<string, number> = {
  minor: 1,
  low: 2,
  moderate: 3,
  medium: 3,
  high: 4,
  major: 5,
  severe: 5,
  critical: 5,
};

export function parseSeverity(raw: string | undefined): number | undefined {
  if (isMissing(raw) || raw === undefined) return undefined;
  const word = SEVERITY_WORDS[raw.trim().toLowerCase()];
  if (word !== undefined) return word;
  const n = parseAmount(raw);
  return n !== undefined && Number.isInteger(n) && n >= 1 && n <= 5 ? n : NaN;
}

// ============================================================================
// Categorical parsing
// ============================================================================

/** "Small ($10M-$100M)" and "small" both map to Small. */
export function parseSizeCategory(raw: string | undefined): SizeCategory | null {
  if (isMissing(raw) || raw === undefined) return null;
  const s = raw.trim().toLowerCase();
  // longest first so "very large" never matches "large"
  const byLength = [...SIZE_CATEGORIES].sort((a, b) => b.length - a.length);
  return byLength.find((c) => s.startsWith(c.toLowerCase())) ?? null;
}

export function sizeFromRevenue(revenueMillions: number): SizeCategory {
  if (revenueMillions < 100) return "Small";
  if (revenueMillions < 1_000) return "Medium";
  if (revenueMillions < 10_000) return "Large";
  return "Very Large";
}

/** 20-point bands over the 0-100 transparency score. */
export function reportingLevelForScore(score: number): ReportingLevel {
  const idx = Math.min(REPORTING_LEVELS.length - 1, Math.max(0, Math.floor(score / 20)));
  return REPORTING_LEVELS[idx];
}

export function parseReportingLevel(raw: string | undefined): ReportingLevel | null {
  if (isMissing(raw) || raw === undefined) return null;
  const s = raw.trim().toLowerCase();
  return REPORTING_LEVELS.find((l) => l.toLowerCase() === s) ?? null;
}

/** "water_resource_protection" → "Water Resource Protection" */
export function causeName(columnSuffix: string): string {
  return columnSuffix
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}
