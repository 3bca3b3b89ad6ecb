// ============================================================================
// Dataset Types
// ============================================================================

export const SIZE_CATEGORIES = ["Small", "Medium", "Large", "Very Large"] as const;
export type SizeCategory = (typeof SIZE_CATEGORIES)[number];

export const REPORTING_LEVELS = [
  "Minimal",
  "Basic",
  "Standard",
  "Detailed",
  "Comprehensive",
] as const;
export type ReportingLevel = (typeof REPORTING_LEVELS)[number];

export const REGIONS = ["Northeast", "Midwest", "South", "West"] as const;
export type Region = (typeof REGIONS)[number];

/**
 * One company of the giving dataset. Monetary amounts are USD millions.
 * Optional fields are `null` when the source row left them blank.
 */
export interface Company {
  name: string;
  state: string; // 2-letter code, upper-case
  region: Region | null;
  industry: string;
  size: SizeCategory | null;
  revenue: number | null;
  giving: number;
  localGiving: number | null;
  transparencyScore: number | null; // 0-100
  esgScore: number | null; // 0-100
  impactScore: number | null;
  lossContingencies: number | null;
  remediationExpenses: number | null;
  incidentCount: number | null;
  reportingLevel: ReportingLevel | null;
  years: number[]; // sorted ascending, at least one
  causeAreas: Record<string, number>;
}

export interface Incident {
  companyName: string | null; // null = anonymized
  state: string;
  latitude: number;
  longitude: number;
  type: string;
  severity: number; // 1 (minor) .. 5 (major)
  remediationCost: number;
  inEnvironmentalJusticeCommunity: boolean;
  year: number | null;
  promptDisclosure: boolean | null;
}

/** One company-year observation used by trend views. */
export interface HistoryRecord {
  companyName: string;
  year: number;
  giving: number;
  revenue: number | null;
  transparencyScore: number | null;
}

export interface SkippedRow {
  source: "companies" | "incidents" | "history";
  line: number;
  reason: string;
}

export interface LoadReport {
  companies: { loaded: number; skipped: number };
  incidents: { loaded: number; skipped: number };
  history: { loaded: number; skipped: number };
  /** First few skip reasons, for diagnostics. */
  skippedRows: SkippedRow[];
}

/**
 * An immutable, loaded dataset. `version` changes on every (re)load so that
 * cached aggregates from a previous load are never served.
 */
export interface Dataset {
  version: number;
  source: string;
  loadedAt: string;
  companies: readonly Company[];
  incidents: readonly Incident[];
  history: readonly HistoryRecord[];
  report: LoadReport;
}

/** The subset of a dataset surviving the active filters. */
export interface FilteredView {
  companies: Company[];
  incidents: Incident[];
  history: HistoryRecord[];
}

export interface DatasetSourceConfig {
  companiesCsv?: string; // file path or https:// URL
  incidentsCsv?: string;
  historyCsv?: string;
  givingUnits: "millions" | "dollars";
  maxDownloadBytes: number;
  downloadTimeoutMs: number;
  sampleSeed: number;
  sampleCompanyCount: number;
}
