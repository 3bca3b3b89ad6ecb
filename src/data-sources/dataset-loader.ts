import axios from "axios";
import { parse } from "csv-parse/sync";
import fsp from "fs/promises";
import path from "path";
import { DatasetLoadError } from "../core/errors.js";
import { getErrorMessage, logInfo, logWarn } from "../core/logging.js";
import {
  causeName,
  isMissing,
  normalizeRow,
  parseAmount,
  parseBoolean,
  parseReportingLevel,
  parseSeverity,
  parseSizeCategory,
  parseYears,
  pick,
  reportingLevelForScore,
  sizeFromRevenue,
  UNIT_SUFFIXES,
} from "../domain/dataset/normalize.js";
import { isRegion, regionForState } from "../domain/dataset/regions.js";
import {
  generateSampleData,
  type ImpactLevel,
  type SampleData,
  type SampleVocabulary,
} from "../domain/dataset/sample-generator.js";
import {
  SIZE_CATEGORIES,
  type Company,
  type Dataset,
  type DatasetSourceConfig,
  type HistoryRecord,
  type Incident,
  type LoadReport,
  type SizeCategory,
  type SkippedRow,
} from "../domain/dataset/types.js";

export const MAX_REPORTED_SKIPS = 50;

// ============================================================================
// Column aliases (normalized header names)
// ============================================================================

const COMPANY_COLUMNS = {
  name: ["company_name", "company", "name", "corporation", "organization"],
  state: ["state", "hq_state", "headquarters_state", "state_code"],
  region: ["region"],
  industry: ["industry", "sector"],
  size: ["size", "size_category", "company_size"],
  revenue: ["revenue", "revenue_millions", "annual_revenue"],
  giving: [
    "environmental_giving",
    "env_giving",
    "env_giving_millions",
    "giving",
    "charitable_contributions",
    "donations",
    "philanthropy",
  ],
  localGiving: ["local_giving", "local_environmental_giving", "local_giving_millions"],
  transparency: ["transparency_score", "transparency", "reporting_quality", "disclosure_quality"],
  esg: ["esg_score", "esg"],
  impact: ["environmental_impact_score", "environmental_impact", "impact_score", "impact"],
  lossContingencies: ["environmental_loss_contingencies", "env_loss_contingencies", "loss_contingencies"],
  remediation: ["environmental_remediation_expenses", "env_remediation", "remediation_expenses"],
  incidentCount: ["incident_count", "environmental_incidents", "incidents"],
  reportingLevel: ["reporting_level", "reporting_detail_level", "disclosure_level"],
  years: ["years", "year", "fiscal_year", "years_of_record"],
} as const;

const INCIDENT_COLUMNS = {
  company: ["company_name", "company", "responsible_party"],
  state: ["state", "location_state"],
  latitude: ["latitude", "lat"],
  longitude: ["longitude", "lon", "lng", "long"],
  type: ["incident_type", "type"],
  severity: ["severity", "severity_level"],
  remediationCost: ["remediation_cost", "cost", "remediation_cost_millions"],
  ej: ["ej_community", "in_ej_community", "environmental_justice", "environmental_justice_community"],
  year: ["year", "incident_year", "date", "incident_date"],
  promptDisclosure: ["prompt_disclosure", "disclosed_promptly"],
} as const;

const HISTORY_COLUMNS = {
  company: ["company_name", "company", "name"],
  year: ["year", "fiscal_year"],
  giving: COMPANY_COLUMNS.giving,
  revenue: COMPANY_COLUMNS.revenue,
  transparency: COMPANY_COLUMNS.transparency,
} as const;

const CAUSE_PREFIX = "giving_";
const NON_CAUSE_SUFFIXES = new Set<string>([...UNIT_SUFFIXES, "pct", "percent"]);

// ============================================================================
// Row parsing
// ============================================================================

type RowResult<T> = { ok: true; value: T } | { ok: false; reason: string };

class RowError extends Error {}

function requireText(row: Record<string, string>, aliases: readonly string[], label: string): string {
  const v = pick(row, aliases);
  if (isMissing(v) || v === undefined) throw new RowError(`missing ${label}`);
  return v;
}

/** Optional amount; throws on text that is not a number or on a negative. */
function optionalAmount(
  row: Record<string, string>,
  aliases: readonly string[],
  label: string,
  scale = 1,
): number | null {
  const n = parseAmount(pick(row, aliases));
  if (n === undefined) return null;
  if (Number.isNaN(n)) throw new RowError(`unparsable ${label}`);
  if (n < 0) throw new RowError(`negative ${label}`);
  return n * scale;
}

function optionalScore(row: Record<string, string>, aliases: readonly string[], label: string): number | null {
  const n = optionalAmount(row, aliases, label);
  if (n !== null && n > 100) throw new RowError(`${label} out of range 0-100`);
  return n;
}

function parseState(raw: string): string {
  const state = raw.trim().toUpperCase();
  if (!/^[A-Z]{2}$/.test(state)) throw new RowError(`invalid state "${raw}"`);
  return state;
}

export function parseCompanyRow(
  row: Record<string, string>,
  moneyScale: number,
): RowResult<Company> {
  try {
    const c = COMPANY_COLUMNS;
    const name = requireText(row, c.name, "company name");
    const state = parseState(requireText(row, c.state, "state"));
    const industry = requireText(row, c.industry, "industry");

    const giving = optionalAmount(row, c.giving, "environmental giving", moneyScale);
    if (giving === null) throw new RowError("missing environmental giving");

    const revenue = optionalAmount(row, c.revenue, "revenue", moneyScale);
    const localGiving = optionalAmount(row, c.localGiving, "local giving", moneyScale);
    if (localGiving !== null && localGiving > giving) {
      throw new RowError("local giving exceeds environmental giving");
    }
    const transparencyScore = optionalScore(row, c.transparency, "transparency score");
    const esgScore = optionalScore(row, c.esg, "ESG score");
    const impactScore = optionalAmount(row, c.impact, "impact score");
    const lossContingencies = optionalAmount(row, c.lossContingencies, "loss contingencies", moneyScale);
    const remediationExpenses = optionalAmount(row, c.remediation, "remediation expenses", moneyScale);

    const incidentCount = optionalAmount(row, c.incidentCount, "incident count");
    if (incidentCount !== null && !Number.isInteger(incidentCount)) {
      throw new RowError("incident count must be a whole number");
    }

    const rawYears = pick(row, c.years);
    const years = parseYears(rawYears);
    if (!years) {
      throw new RowError(isMissing(rawYears) ? "missing year" : `invalid year "${rawYears}"`);
    }

    const regionText = titleCase(pick(row, c.region) ?? "");

    const causeAreas: Record<string, number> = {};
    for (const [key, value] of Object.entries(row)) {
      if (!key.startsWith(CAUSE_PREFIX)) continue;
      const suffix = key.slice(CAUSE_PREFIX.length);
      if (!suffix || NON_CAUSE_SUFFIXES.has(suffix)) continue;
      const amount = parseAmount(value);
      if (amount === undefined) continue;
      if (Number.isNaN(amount) || amount < 0) {
        throw new RowError(`invalid cause-area amount in "${key}"`);
      }
      causeAreas[causeName(suffix)] = amount * moneyScale;
    }

    return {
      ok: true,
      value: {
        name: name.trim(),
        state,
        region: isRegion(regionText) ? regionText : regionForState(state),
        industry: industry.trim(),
        size:
          parseSizeCategory(pick(row, c.size)) ??
          (revenue !== null ? sizeFromRevenue(revenue) : null),
        revenue,
        giving,
        localGiving,
        transparencyScore,
        esgScore,
        impactScore,
        lossContingencies,
        remediationExpenses,
        incidentCount,
        reportingLevel:
          parseReportingLevel(pick(row, c.reportingLevel)) ??
          (transparencyScore !== null ? reportingLevelForScore(transparencyScore) : null),
        years,
        causeAreas,
      },
    };
  } catch (error) {
    if (error instanceof RowError) return { ok: false, reason: error.message };
    throw error;
  }
}

function titleCase(s: string): string {
  const t = s.trim().toLowerCase();
  return t.charAt(0).toUpperCase() + t.slice(1);
}

/**
 * Resolves an incident's company reference. Names match case-insensitively
 * and are rewritten to the company's canonical spelling.
 */
export function parseIncidentRow(
  row: Record<string, string>,
  companyNames: Map<string, string>,
  moneyScale: number,
): RowResult<Incident> {
  try {
    const c = INCIDENT_COLUMNS;
    const rawCompany = pick(row, c.company);
    let companyName: string | null = null;
    if (!isMissing(rawCompany) && rawCompany !== undefined) {
      const canonical = companyNames.get(rawCompany.trim().toLowerCase());
      if (!canonical) throw new RowError(`unknown company "${rawCompany}"`);
      companyName = canonical;
    }

    const state = parseState(requireText(row, c.state, "state"));
    const latitude = parseAmount(requireText(row, c.latitude, "latitude"));
    const longitude = parseAmount(requireText(row, c.longitude, "longitude"));
    if (latitude === undefined || Number.isNaN(latitude) || latitude < -90 || latitude > 90) {
      throw new RowError("invalid latitude");
    }
    if (longitude === undefined || Number.isNaN(longitude) || longitude < -180 || longitude > 180) {
      throw new RowError("invalid longitude");
    }

    const type = requireText(row, c.type, "incident type");
    const severity = parseSeverity(pick(row, c.severity));
    if (severity === undefined) throw new RowError("missing severity");
    if (Number.isNaN(severity)) throw new RowError("severity must be 1-5");

    const remediationCost = optionalAmount(row, c.remediationCost, "remediation cost", moneyScale) ?? 0;

    const rawYear = pick(row, c.year);
    const years = parseYears(rawYear);
    if (!isMissing(rawYear) && !years) throw new RowError(`invalid year "${rawYear}"`);

    return {
      ok: true,
      value: {
        companyName,
        state,
        latitude,
        longitude,
        type: type.trim(),
        severity,
        remediationCost,
        inEnvironmentalJusticeCommunity: parseBoolean(pick(row, c.ej)) ?? false,
        year: years ? years[0] : null,
        promptDisclosure: parseBoolean(pick(row, c.promptDisclosure)) ?? null,
      },
    };
  } catch (error) {
    if (error instanceof RowError) return { ok: false, reason: error.message };
    throw error;
  }
}

export function parseHistoryRow(
  row: Record<string, string>,
  companyNames: Map<string, string>,
  moneyScale: number,
): RowResult<HistoryRecord> {
  try {
    const c = HISTORY_COLUMNS;
    const rawCompany = requireText(row, c.company, "company name");
    const companyName = companyNames.get(rawCompany.trim().toLowerCase());
    if (!companyName) throw new RowError(`unknown company "${rawCompany}"`);

    const rawYear = requireText(row, c.year, "year");
    const years = parseYears(rawYear);
    if (!years || years.length !== 1) throw new RowError(`invalid year "${rawYear}"`);

    const giving = optionalAmount(row, c.giving, "environmental giving", moneyScale);
    if (giving === null) throw new RowError("missing environmental giving");

    return {
      ok: true,
      value: {
        companyName,
        year: years[0],
        giving,
        revenue: optionalAmount(row, c.revenue, "revenue", moneyScale),
        transparencyScore: optionalScore(row, c.transparency, "transparency score"),
      },
    };
  } catch (error) {
    if (error instanceof RowError) return { ok: false, reason: error.message };
    throw error;
  }
}

// ============================================================================
// CSV reading
// ============================================================================

interface CsvRow {
  line: number;
  row: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses CSV text into normalized rows tagged with their source line. */
export function readCsvRows(content: string, source: string): CsvRow[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
      info: true,
    });
  } catch (error) {
    throw new DatasetLoadError(source, `CSV parse failed: ${getErrorMessage(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new DatasetLoadError(source, "CSV parser returned no rows");
  }

  const rows: CsvRow[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry) || !isRecord(entry.record)) continue;
    const info = entry.info;
    const line = isRecord(info) && typeof info.lines === "number" ? info.lines : rows.length + 2;
    rows.push({ line, row: normalizeRow(entry.record) });
  }
  return rows;
}

// ============================================================================
// Vocabulary
// ============================================================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isSizeCategory(value: unknown): value is SizeCategory {
  return typeof value === "string" && SIZE_CATEGORIES.some((size) => size === value);
}

function isImpactLevel(value: unknown): value is ImpactLevel {
  return value === "high" || value === "medium" || value === "low";
}

/** Validates the sample vocabulary JSON. */
export function parseVocabulary(raw: unknown): SampleVocabulary {
  const fail = (what: string): never => {
    throw new Error(`Invalid sample vocabulary: ${what}`);
  };
  if (!isRecord(raw)) return fail("not an object");

  const states = Array.isArray(raw.states)
    ? raw.states.map((s) =>
        isRecord(s) && typeof s.code === "string" && typeof s.weight === "number"
          ? { code: s.code, weight: s.weight }
          : fail("states entry"),
      )
    : fail("states");

  const industries = Array.isArray(raw.industries)
    ? raw.industries.map((i) =>
        isRecord(i) &&
        typeof i.name === "string" &&
        typeof i.weight === "number" &&
        isImpactLevel(i.impact) &&
        isStringArray(i.words)
          ? { name: i.name, weight: i.weight, impact: i.impact, words: i.words }
          : fail("industries entry"),
      )
    : fail("industries");

  const sizes = Array.isArray(raw.sizes)
    ? raw.sizes.map((s) =>
        isRecord(s) &&
        isSizeCategory(s.name) &&
        typeof s.weight === "number" &&
        typeof s.minRevenue === "number" &&
        typeof s.maxRevenue === "number"
          ? { name: s.name, weight: s.weight, minRevenue: s.minRevenue, maxRevenue: s.maxRevenue }
          : fail("sizes entry"),
      )
    : fail("sizes");

  const types = raw.incidentTypes;
  if (
    !isRecord(types) ||
    !isStringArray(types.high) ||
    !isStringArray(types.medium) ||
    !isStringArray(types.low)
  ) {
    return fail("incidentTypes");
  }

  const years =
    Array.isArray(raw.years) && raw.years.every((y) => Number.isInteger(y))
      ? raw.years.filter((y): y is number => typeof y === "number")
      : fail("years");

  if (!isStringArray(raw.namePrefixes)) return fail("namePrefixes");
  if (!isStringArray(raw.nameSuffixes)) return fail("nameSuffixes");
  if (!isStringArray(raw.causes)) return fail("causes");
  if (states.length === 0 || industries.length === 0 || sizes.length === 0 || years.length === 0) {
    return fail("states, industries, sizes and years must be non-empty");
  }

  return {
    states,
    industries,
    sizes,
    namePrefixes: raw.namePrefixes,
    nameSuffixes: raw.nameSuffixes,
    causes: raw.causes,
    incidentTypes: { high: types.high, medium: types.medium, low: types.low },
    years,
  };
}

// ============================================================================
// DatasetLoader
// ============================================================================

/**
 * Loads the company, incident and history tables from CSV files or HTTPS
 * URLs. Without a configured companies CSV it generates the seeded sample
 * dataset instead. Every load gets a fresh version number.
 */
export class DatasetLoader {
  private config: DatasetSourceConfig;
  private vocabularyPath: string;
  private version = 0;

  constructor(config: DatasetSourceConfig, vocabularyPath: string) {
    this.config = config;
    this.vocabularyPath = vocabularyPath;
  }

  async load(): Promise<Dataset> {
    const start = Date.now();
    const dataset = this.config.companiesCsv
      ? await this.loadFromCsv(this.config.companiesCsv)
      : await this.loadSample();

    const { report } = dataset;
    logInfo(
      `Dataset v${dataset.version} loaded from ${dataset.source} in ${Date.now() - start}ms: ` +
        `${report.companies.loaded} companies (${report.companies.skipped} skipped), ` +
        `${report.incidents.loaded} incidents (${report.incidents.skipped} skipped), ` +
        `${report.history.loaded} history rows (${report.history.skipped} skipped)`,
    );
    if (report.skippedRows.length > 0) {
      logWarn(
        `Skipped rows, first: ${report.skippedRows[0].source} line ${report.skippedRows[0].line}: ${report.skippedRows[0].reason}`,
      );
    }
    return dataset;
  }

  private async loadSample(): Promise<Dataset> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fsp.readFile(this.vocabularyPath, "utf-8"));
    } catch (error) {
      throw new DatasetLoadError(this.vocabularyPath, getErrorMessage(error));
    }
    const data: SampleData = generateSampleData(
      parseVocabulary(raw),
      this.config.sampleCompanyCount,
      this.config.sampleSeed,
    );
    return this.buildDataset(`sample (seed ${this.config.sampleSeed})`, data, reportFor(data));
  }

  private async loadFromCsv(companiesSource: string): Promise<Dataset> {
    const scale = this.config.givingUnits === "dollars" ? 1e-6 : 1;
    const skipped: SkippedRow[] = [];
    const report = reportFor({ companies: [], incidents: [], history: [] });
    const skip = (row: SkippedRow, table: "companies" | "incidents" | "history") => {
      report[table].skipped++;
      if (skipped.length < MAX_REPORTED_SKIPS) skipped.push(row);
    };

    // Companies
    const companies: Company[] = [];
    const names = new Map<string, string>();
    for (const { line, row } of readCsvRows(await this.readSource(companiesSource), companiesSource)) {
      const result = parseCompanyRow(row, scale);
      if (!result.ok) {
        skip({ source: "companies", line, reason: result.reason }, "companies");
        continue;
      }
      const key = result.value.name.toLowerCase();
      if (names.has(key)) {
        skip({ source: "companies", line, reason: `duplicate company "${result.value.name}"` }, "companies");
        continue;
      }
      names.set(key, result.value.name);
      companies.push(result.value);
    }

    // Incidents
    const incidents: Incident[] = [];
    if (this.config.incidentsCsv) {
      const source = this.config.incidentsCsv;
      for (const { line, row } of readCsvRows(await this.readSource(source), source)) {
        const result = parseIncidentRow(row, names, scale);
        if (result.ok) incidents.push(result.value);
        else skip({ source: "incidents", line, reason: result.reason }, "incidents");
      }
    }

    // History
    const history: HistoryRecord[] = [];
    if (this.config.historyCsv) {
      const source = this.config.historyCsv;
      const seen = new Set<string>();
      for (const { line, row } of readCsvRows(await this.readSource(source), source)) {
        const result = parseHistoryRow(row, names, scale);
        if (!result.ok) {
          skip({ source: "history", line, reason: result.reason }, "history");
          continue;
        }
        const { companyName, year } = result.value;
        const key = `${companyName.toLowerCase()}\u0000${year}`;
        if (seen.has(key)) {
          skip({ source: "history", line, reason: `duplicate history for "${companyName}" in ${year}` }, "history");
          continue;
        }
        seen.add(key);
        history.push(result.value);
      }
    }

    report.companies.loaded = companies.length;
    report.incidents.loaded = incidents.length;
    report.history.loaded = history.length;
    report.skippedRows = skipped;

    return this.buildDataset(path.basename(companiesSource), { companies, incidents, history }, report);
  }

  private async readSource(location: string): Promise<string> {
    if (location.startsWith("https://")) {
      logInfo(`Downloading ${location}...`);
      try {
        const response = await axios.get<string>(location, {
          responseType: "text",
          timeout: this.config.downloadTimeoutMs,
          maxContentLength: this.config.maxDownloadBytes,
        });
        return response.data;
      } catch (error) {
        throw new DatasetLoadError(location, `download failed: ${getErrorMessage(error)}`);
      }
    }
    try {
      return await fsp.readFile(location, "utf-8");
    } catch (error) {
      throw new DatasetLoadError(location, getErrorMessage(error));
    }
  }

  private buildDataset(source: string, data: SampleData, report: LoadReport): Dataset {
    this.version++;
    return {
      version: this.version,
      source,
      loadedAt: new Date().toISOString(),
      companies: Object.freeze(data.companies),
      incidents: Object.freeze(data.incidents),
      history: Object.freeze(data.history),
      report,
    };
  }
}

function reportFor(data: SampleData): LoadReport {
  return {
    companies: { loaded: data.companies.length, skipped: 0 },
    incidents: { loaded: data.incidents.length, skipped: 0 },
    history: { loaded: data.history.length, skipped: 0 },
    skippedRows: [],
  };
}
