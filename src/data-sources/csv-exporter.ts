import { stringify } from "csv-stringify/sync";
import fsp from "fs/promises";
import path from "path";
import { logInfo } from "../core/logging.js";
import type { Company, FilteredView, HistoryRecord, Incident } from "../domain/dataset/types.js";

export const EXPORT_TABLES = ["companies", "incidents", "history"] as const;
export type ExportTable = (typeof EXPORT_TABLES)[number];

type Cell = string | number | boolean | null;

function causeColumn(cause: string): string {
  return `giving_${cause.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "")}`;
}

/**
 * Header names are chosen so that an exported file loads back through the
 * dataset loader unchanged.
 */
function companyTable(companies: readonly Company[]): { columns: string[]; rows: Cell[][] } {
  const causes = [...new Set(companies.flatMap((c) => Object.keys(c.causeAreas)))].sort();
  const columns = [
    "company_name",
    "state",
    "region",
    "industry",
    "size",
    "revenue_millions",
    "env_giving_millions",
    "local_giving_millions",
    "transparency_score",
    "esg_score",
    "environmental_impact_score",
    "environmental_loss_contingencies",
    "environmental_remediation_expenses",
    "incident_count",
    "reporting_level",
    "years",
    ...causes.map(causeColumn),
  ];
  const rows = companies.map((c): Cell[] => [
    c.name,
    c.state,
    c.region,
    c.industry,
    c.size,
    c.revenue,
    c.giving,
    c.localGiving,
    c.transparencyScore,
    c.esgScore,
    c.impactScore,
    c.lossContingencies,
    c.remediationExpenses,
    c.incidentCount,
    c.reportingLevel,
    c.years.join(";"),
    ...causes.map((cause) => c.causeAreas[cause] ?? null),
  ]);
  return { columns, rows };
}

function incidentTable(incidents: readonly Incident[]): { columns: string[]; rows: Cell[][] } {
  return {
    columns: [
      "company_name",
      "state",
      "latitude",
      "longitude",
      "incident_type",
      "severity",
      "remediation_cost_millions",
      "ej_community",
      "year",
      "prompt_disclosure",
    ],
    rows: incidents.map((i) => [
      i.companyName,
      i.state,
      i.latitude,
      i.longitude,
      i.type,
      i.severity,
      i.remediationCost,
      i.inEnvironmentalJusticeCommunity,
      i.year,
      i.promptDisclosure,
    ]),
  };
}

function historyTable(history: readonly HistoryRecord[]): { columns: string[]; rows: Cell[][] } {
  return {
    columns: ["company_name", "year", "env_giving_millions", "revenue_millions", "transparency_score"],
    rows: history.map((h) => [h.companyName, h.year, h.giving, h.revenue, h.transparencyScore]),
  };
}

/** Serializes one table of a (possibly filtered) view to CSV text. */
export function toCsv(view: FilteredView, table: ExportTable): { csv: string; rowCount: number } {
  const { columns, rows } =
    table === "companies"
      ? companyTable(view.companies)
      : table === "incidents"
        ? incidentTable(view.incidents)
        : historyTable(view.history);

  const csv = stringify([columns, ...rows], {
    cast: {
      boolean: (value) => (value ? "true" : "false"),
    },
  });
  return { csv, rowCount: rows.length };
}

const FILE_NAME = /^[\w.-]{1,100}\.csv$/;

export function defaultExportName(table: ExportTable, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `${table}_${stamp}.csv`;
}

/**
 * Writes CSV text under the exports directory. Only bare file names are
 * accepted; anything with a path separator is rejected.
 */
export async function writeExport(
  exportDir: string,
  fileName: string,
  csv: string,
): Promise<string> {
  if (!FILE_NAME.test(fileName) || fileName.startsWith(".")) {
    throw new Error(
      `Invalid export file name "${fileName}": use letters, digits, ".", "_" or "-" and end in .csv`,
    );
  }
  await fsp.mkdir(exportDir, { recursive: true });
  const target = path.join(exportDir, fileName);
  const tmp = `${target}.tmp`;
  await fsp.writeFile(tmp, csv, "utf-8");
  await fsp.rename(tmp, target);
  logInfo(`Exported ${fileName} to ${exportDir}`);
  return target;
}
