import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { DatasetSourceConfig } from "../domain/dataset/types.js";
import type {
  BandingPolicy,
  GivingBasis,
  LeadershipPolicy,
} from "../domain/leadership/types.js";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Nearest ancestor holding package.json. Works from src/ under tsx and from
 * dist/src/ after a build.
 */
function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const PROJECT_ROOT = findProjectRoot(__dirname);

export interface AppConfig {
  dataset: DatasetSourceConfig;
  leadership: LeadershipPolicy;
  dataDir: string;
  cacheMaxEntries: number;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envFloat(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isFinite);
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envString(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

function parseNumberList(raw?: string): number[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number);
}

// ============================================================================
// Leadership Policy
// ============================================================================

const DEFAULT_FIXED_THRESHOLDS: [number, number, number] = [40, 60, 80];

function loadBanding(problems: string[]): BandingPolicy {
  const raw = (process.env.LEADERSHIP_BANDING ?? "").trim();
  const mode = raw.toLowerCase();

  if (mode === "fixed") {
    const rawThresholds = process.env.LEADERSHIP_FIXED_THRESHOLDS;
    if (!rawThresholds?.trim()) {
      return { mode: "fixed", thresholds: DEFAULT_FIXED_THRESHOLDS };
    }
    const parsed = parseNumberList(rawThresholds);
    if (parsed.length !== 3) {
      problems.push(`Fixed thresholds need 3 values, got ${parsed.length}`);
      return { mode: "fixed", thresholds: DEFAULT_FIXED_THRESHOLDS };
    }
    return { mode: "fixed", thresholds: [parsed[0], parsed[1], parsed[2]] };
  }

  if (mode === "average-relative" || mode === "average") {
    return {
      mode: "average-relative",
      spread: envFloat("LEADERSHIP_SPREAD", 0.5),
    };
  }

  if (mode !== "" && mode !== "quartile") {
    problems.push(`Unknown banding mode "${raw}"`);
  }
  return { mode: "quartile" };
}

function loadGivingBasis(problems: string[]): GivingBasis {
  const raw = (process.env.LEADERSHIP_GIVING_BASIS ?? "").trim();
  const basis = raw.toLowerCase();
  if (basis === "absolute") return "absolute";
  if (basis !== "" && basis !== "revenue_share") {
    problems.push(`Unknown giving basis "${raw}"`);
  }
  return "revenue_share";
}

/**
 * Loads the leadership scoring policy from environment variables and
 * validates it. Weights and banding are policy, not constants: every value
 * can be overridden without a code change.
 */
export function loadLeadershipPolicy(): LeadershipPolicy {
  const problems: string[] = [];
  const givingBasis = loadGivingBasis(problems);
  const banding = loadBanding(problems);

  const policy: LeadershipPolicy = {
    // 35+30+15+10+10 = 100
    weights: {
      giving: envInt("LEADERSHIP_WEIGHT_GIVING", 35),
      transparency: envInt("LEADERSHIP_WEIGHT_TRANSPARENCY", 30),
      consistency: envInt("LEADERSHIP_WEIGHT_CONSISTENCY", 15),
      impact: envInt("LEADERSHIP_WEIGHT_IMPACT", 10),
      incidents: envInt("LEADERSHIP_WEIGHT_INCIDENTS", 10),
    },
    givingBasis,
    banding,
    listSize: Math.min(100, Math.max(1, envInt("LEADERSHIP_LIST_SIZE", 10))),
  };
  validateLeadershipPolicy(policy, problems);
  return policy;
}

/**
 * Validate policy invariants at startup.
 * Throws on misconfiguration rather than silently scoring with broken weights.
 */
export function validateLeadershipPolicy(
  p: LeadershipPolicy,
  loadProblems: readonly string[] = [],
): void {
  const errors = [...loadProblems];

  const weights = Object.values(p.weights);
  if (weights.some((w) => w < 0)) {
    errors.push("All weights must be non-negative");
  }
  const weightSum = weights.reduce((a, b) => a + b, 0);
  if (weightSum !== 100) {
    errors.push(`Weights must sum to 100, got ${weightSum}`);
  }

  if (p.banding.mode === "fixed") {
    const [low, mid, high] = p.banding.thresholds;
    if ([low, mid, high].some((t) => !Number.isFinite(t))) {
      errors.push("Fixed thresholds must be numbers");
    } else if (!(low <= mid && mid <= high)) {
      errors.push("Fixed thresholds must be ascending");
    } else if (low < 0 || high > 100) {
      errors.push("Fixed thresholds must be between 0 and 100");
    }
  }

  if (p.banding.mode === "average-relative") {
    if (!Number.isFinite(p.banding.spread) || p.banding.spread < 0) {
      errors.push("Average-relative spread must be a non-negative number");
    }
  }

  if (!Number.isInteger(p.listSize) || p.listSize < 1) {
    errors.push("listSize must be a positive integer");
  }

  if (errors.length > 0) {
    throw new Error(
      `Invalid leadership policy:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

// ============================================================================
// Dataset Source Config
// ============================================================================

/**
 * Loads dataset source locations from environment variables.
 * With no CSV configured the server falls back to the seeded sample dataset.
 */
export function loadDatasetConfig(): DatasetSourceConfig {
  const units = (process.env.GIVING_UNITS ?? "").trim().toLowerCase();
  const config: DatasetSourceConfig = {
    companiesCsv: envString("COMPANIES_CSV"),
    incidentsCsv: envString("INCIDENTS_CSV"),
    historyCsv: envString("HISTORY_CSV"),
    givingUnits: units === "dollars" ? "dollars" : "millions",
    maxDownloadBytes: Math.min(
      200 * 1024 * 1024,
      Math.max(1024, envInt("DATASET_MAX_DOWNLOAD_BYTES", 50 * 1024 * 1024)),
    ),
    downloadTimeoutMs: Math.max(1000, envInt("DATASET_DOWNLOAD_TIMEOUT_MS", 60_000)),
    sampleSeed: envInt("SAMPLE_SEED", 42),
    sampleCompanyCount: Math.min(
      10_000,
      Math.max(1, envInt("SAMPLE_COMPANY_COUNT", 500)),
    ),
  };
  validateDatasetConfig(config);
  return config;
}

export function validateDatasetConfig(config: DatasetSourceConfig): void {
  const errors: string[] = [];

  for (const [key, value] of [
    ["COMPANIES_CSV", config.companiesCsv],
    ["INCIDENTS_CSV", config.incidentsCsv],
    ["HISTORY_CSV", config.historyCsv],
  ] as const) {
    if (value && /^[a-z]+:\/\//i.test(value) && !value.startsWith("https://")) {
      errors.push(`${key} must be a file path or an https:// URL`);
    }
  }

  if ((config.incidentsCsv || config.historyCsv) && !config.companiesCsv) {
    errors.push("INCIDENTS_CSV and HISTORY_CSV require COMPANIES_CSV");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid dataset config:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Loads full application config.
 */
export function loadConfig(): AppConfig {
  const leadership = loadLeadershipPolicy();
  const dataDir = envString("DATA_DIR");
  return {
    dataset: loadDatasetConfig(),
    leadership,
    dataDir: dataDir ? path.resolve(dataDir) : path.join(PROJECT_ROOT, "data"),
    cacheMaxEntries: Math.min(
      10_000,
      Math.max(1, envInt("AGGREGATE_CACHE_MAX_ENTRIES", 500)),
    ),
  };
}
