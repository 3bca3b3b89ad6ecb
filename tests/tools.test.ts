import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";

// Suppress log output in tests
vi.mock("../src/core/logging.js", () => ({
  logInfo: vi.fn(),
  logError: vi.fn(),
  logWarn: vi.fn(),
  logDebug: vi.fn(),
  getErrorMessage: (e: unknown) => (e instanceof Error ? e.message : String(e)),
}));

import type { AppConfig } from "../src/core/config.js";
import { toCsv } from "../src/data-sources/csv-exporter.js";
import { DatasetLoader } from "../src/data-sources/dataset-loader.js";
import { FilterPresetStore } from "../src/data-sources/filter-preset-store.js";
import { QueryHistoryStore } from "../src/data-sources/query-history-store.js";
import { ensureSqlJs } from "../src/data-sources/sqlite-adapter.js";
import { AggregateCache } from "../src/domain/dashboard/aggregate-cache.js";
import { DashboardService } from "../src/domain/dashboard/dashboard-service.js";
import { SessionRegistry } from "../src/domain/dashboard/session-registry.js";
import {
  closeServerContext,
  SAMPLE_VOCABULARY_PATH,
  type ServerContext,
} from "../src/server/context.js";
import { createToolRegistry } from "../src/server/index.js";
import { makeCompany, makePolicy } from "./fixtures.js";

const companies = [
  makeCompany({ name: "Alpha Energy", state: "TX", region: "South", industry: "Energy", giving: 10, revenue: 100, transparencyScore: 40, years: [2021] }),
  makeCompany({ name: "Beta Energy", state: "CA", region: "West", industry: "Energy", giving: 20, revenue: 400, transparencyScore: 60, years: [2022] }),
  makeCompany({ name: "Gamma Retail", state: "CA", region: "West", industry: "Retail", giving: 30, revenue: null, transparencyScore: 80, years: [2022] }),
];

const registry = createToolRegistry();

describe("MCP tools", () => {
  let dir: string;
  let companiesCsv: string;
  let ctx: ServerContext;

  async function call(
    name: string,
    args: Record<string, unknown> = {},
  ): Promise<{ body: unknown; isError: boolean }> {
    const response = await registry.callTool(name, args, ctx);
    const body: unknown = JSON.parse(response.content[0].text);
    return { body, isError: response.isError };
  }

  beforeEach(async () => {
    await ensureSqlJs();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dashboard-tools-"));
    companiesCsv = path.join(dir, "companies.csv");
    fs.writeFileSync(
      companiesCsv,
      toCsv({ companies, incidents: [], history: [] }, "companies").csv,
    );

    const config: AppConfig = {
      dataset: {
        companiesCsv,
        givingUnits: "millions",
        maxDownloadBytes: 1_000_000,
        downloadTimeoutMs: 1_000,
        sampleSeed: 42,
        sampleCompanyCount: 10,
      },
      leadership: makePolicy(),
      dataDir: dir,
      cacheMaxEntries: 100,
    };
    const loader = new DatasetLoader(config.dataset, SAMPLE_VOCABULARY_PATH);
    const presetStore = new FilterPresetStore(null);
    presetStore.initialize();
    const queryHistoryStore = new QueryHistoryStore();
    queryHistoryStore.initialize(presetStore.getDatabase());

    ctx = {
      config,
      loader,
      dashboard: new DashboardService(await loader.load(), config.leadership, new AggregateCache(100)),
      sessions: new SessionRegistry(),
      presetStore,
      queryHistoryStore,
    };
  });

  afterEach(() => {
    closeServerContext(ctx);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Registry
  // ==========================================================================

  it("registers every tool once", () => {
    expect(registry.listTools().map((t) => t.name).sort()).toEqual([
      "clear_filters",
      "dataset_status",
      "delete_filter_preset",
      "export_csv",
      "get_breakdown",
      "get_cause_areas",
      "get_company",
      "get_correlations",
      "get_filters",
      "get_geographic_summary",
      "get_incident_summary",
      "get_industry_benchmarks",
      "get_leadership",
      "get_overview",
      "get_top_companies",
      "get_transparency_summary",
      "get_trends",
      "list_filter_presets",
      "list_queries",
      "reload_dataset",
      "save_filter_preset",
      "set_filters",
    ]);
  });

  it("rejects unknown tools", async () => {
    await expect(registry.callTool("nope", {}, ctx)).rejects.toThrow("Unknown tool: nope");
  });

  // ==========================================================================
  // Dashboard views and sessions
  // ==========================================================================

  it("answers the overview for the full dataset", async () => {
    const { body, isError } = await call("get_overview");
    expect(isError).toBe(false);
    expect(body).toMatchObject({
      success: true,
      data: {
        session_id: "default",
        filters: {},
        filter_signature: "*",
        companies_in_view: 3,
        overview: { companyCount: 3, totalGiving: 60 },
      },
      attribution: expect.stringMatching(/^Dataset: companies\.csv \(v1, loaded /),
    });
  });

  it("keeps filters per session", async () => {
    const set = await call("set_filters", { session_id: "a", filters: { industry: "Energy" } });
    expect(set.body).toMatchObject({
      data: { session_id: "a", filters: { industry: ["Energy"] }, companies_in_view: 2 },
    });

    expect((await call("get_overview", { session_id: "a" })).body).toMatchObject({
      data: { filter_signature: "industry=ENERGY", overview: { companyCount: 2 } },
    });
    expect((await call("get_overview", { session_id: "b" })).body).toMatchObject({
      data: { overview: { companyCount: 3 } },
    });
  });

  it("applies per-call filters without changing the session", async () => {
    await call("set_filters", { session_id: "a", filters: { industry: ["Energy"] } });
    const adHoc = await call("get_overview", { session_id: "a", filters: { industry: ["Retail"] } });
    expect(adHoc.body).toMatchObject({ data: { companies_in_view: 1 } });

    expect((await call("get_filters", { session_id: "a" })).body).toMatchObject({
      data: { filters: { industry: ["Energy"] } },
    });
  });

  it("clears a session's filters", async () => {
    await call("set_filters", { session_id: "a", filters: { state: ["CA"] } });
    const cleared = await call("clear_filters", { session_id: "a" });
    expect(cleared.body).toMatchObject({ data: { filters: {}, companies_in_view: 3 } });
  });

  it("reports a never-set session with a null update time", async () => {
    expect((await call("get_filters", { session_id: "fresh" })).body).toMatchObject({
      data: { filters: {}, updated_at: null },
    });
  });

  it("turns invalid filters and session ids into tool errors", async () => {
    const badKey = await call("get_overview", { filters: { sector: ["Energy"] } });
    expect(badKey.isError).toBe(true);
    expect(badKey.body).toMatchObject({
      success: false,
      error: expect.stringContaining('Unknown filter key "sector"'),
    });

    const badSession = await call("get_overview", { session_id: "bad id" });
    expect(badSession.isError).toBe(true);
  });

  it("includes charts unless asked not to", async () => {
    const withCharts = await call("get_breakdown", { dimension: "industry" });
    expect(withCharts.body).toHaveProperty("data.charts.length", 2);
    expect(withCharts.body).toMatchObject({
      data: { breakdown: { dimension: "industry", totalGiving: 60 } },
    });

    const without = await call("get_breakdown", { dimension: "industry", include_charts: false });
    expect(without.body).not.toHaveProperty("data.charts");
  });

  it("validates breakdown dimensions", async () => {
    const result = await call("get_breakdown", { dimension: "color" });
    expect(result.isError).toBe(true);
    expect(result.body).toMatchObject({ error: expect.stringMatching(/^Invalid dimension/) });
  });

  it("validates correlation arguments", async () => {
    expect((await call("get_correlations", { x: "giving" })).body).toMatchObject({
      error: "Both x and y are required for a custom pair.",
    });
    expect((await call("get_correlations", { x: "giving", y: "height" })).body).toMatchObject({
      error: 'Unknown metric "height".',
    });
    expect((await call("get_correlations", { metrics: ["giving"] })).body).toMatchObject({
      error: "A correlation matrix needs at least 2 metrics.",
    });
    expect((await call("get_correlations", { metrics: ["giving", "bogus"] })).body).toMatchObject({
      error: "Unknown metrics: bogus.",
    });
  });

  it("correlates a custom pair and builds a matrix", async () => {
    const { body } = await call("get_correlations", {
      x: "transparency",
      y: "giving",
      metrics: ["giving", "transparency"],
    });
    expect(body).toMatchObject({
      success: true,
      data: {
        correlations: [{ status: "ok", x: "transparency", y: "giving", r: 1, pairs: 3 }],
        matrix: { metrics: ["giving", "transparency"] },
      },
    });
  });

  it("scores leadership for the view", async () => {
    const { body } = await call("get_leadership", { include_all: true });
    expect(body).toMatchObject({ data: { scored_count: 3, unscored: [] } });
    expect(body).toHaveProperty("data.scored.length", 3);
  });

  it("ranks top companies and clamps the limit", async () => {
    const { body } = await call("get_top_companies", { limit: 500 });
    expect(body).toMatchObject({
      data: {
        basis: "giving",
        companies: [{ name: "Gamma Retail" }, { name: "Beta Energy" }, { name: "Alpha Energy" }],
      },
    });

    const invalid = await call("get_top_companies", { basis: "size" });
    expect(invalid.isError).toBe(true);
  });

  it("looks up a company within the view", async () => {
    expect((await call("get_company", { name: "gamma" })).body).toMatchObject({
      data: {
        company: { name: "Gamma Retail" },
        leadership: { name: "Gamma Retail" },
        total_matches: 1,
        other_matches: [],
      },
    });

    const missing = await call("get_company", { name: "gamma", filters: { industry: ["Energy"] } });
    expect(missing.body).toMatchObject({
      success: false,
      error: 'No company matching "gamma" in the current view.',
    });
  });

  it.each([
    "get_geographic_summary",
    "get_industry_benchmarks",
    "get_incident_summary",
    "get_transparency_summary",
    "get_cause_areas",
    "get_trends",
  ])("answers %s", async (tool) => {
    const { body, isError } = await call(tool);
    expect(isError).toBe(false);
    expect(body).toMatchObject({ success: true, data: { companies_in_view: 3 } });
  });

  // ==========================================================================
  // Presets
  // ==========================================================================

  it("saves, applies, lists and deletes presets", async () => {
    const saved = await call("save_filter_preset", { name: "west", filters: { region: ["West"] } });
    expect(saved.body).toMatchObject({ data: { preset: { name: "west", filters: { region: ["West"] } } } });

    const applied = await call("set_filters", { session_id: "c", preset: "west" });
    expect(applied.body).toMatchObject({ data: { preset: "west", companies_in_view: 2 } });

    expect((await call("list_filter_presets")).body).toMatchObject({ data: { total: 1 } });
    expect((await call("delete_filter_preset", { name: "west" })).body).toMatchObject({
      data: { deleted: "west" },
    });
    expect((await call("delete_filter_preset", { name: "west" })).body).toMatchObject({
      error: 'Preset "west" not found.',
    });
    expect((await call("set_filters", { preset: "west" })).body).toMatchObject({
      error: 'Preset "west" not found.',
    });
  });

  it("saves the session's filters when none are passed", async () => {
    await call("set_filters", { filters: { size: ["Large"] } });
    expect((await call("save_filter_preset", { name: "large" })).body).toMatchObject({
      data: { preset: { filters: { size: ["Large"] } } },
    });
  });

  it("reports presets as unavailable without a store", async () => {
    ctx.queryHistoryStore = undefined;
    ctx.presetStore?.close();
    ctx.presetStore = undefined;
    expect((await call("list_filter_presets")).body).toMatchObject({
      success: false,
      error: "Filter presets not available. Check server logs for initialization errors.",
    });
  });

  // ==========================================================================
  // Data management
  // ==========================================================================

  it("logs dashboard queries", async () => {
    await call("get_overview");
    const { body } = await call("list_queries", { tool: "get_overview" });
    expect(body).toMatchObject({
      data: {
        total: 1,
        queries: [
          {
            tool: "get_overview",
            session_id: "default",
            filter_signature: "*",
            query: { filters: {} },
            result_count: 3,
          },
        ],
      },
    });
  });

  it("exports the filtered view and writes the file on request", async () => {
    await call("set_filters", { session_id: "r", filters: { industry: ["Retail"] } });
    const { body } = await call("export_csv", {
      session_id: "r",
      write_file: true,
      file_name: "retail.csv",
    });
    const file = path.join(dir, "exports", "retail.csv");

    expect(body).toMatchObject({
      data: {
        table: "companies",
        scope: "filtered",
        filter_signature: "industry=RETAIL",
        row_count: 1,
        file,
      },
    });
    expect(fs.readFileSync(file, "utf-8")).toContain("Gamma Retail");
  });

  it("exports the full dataset regardless of session filters", async () => {
    await call("set_filters", { session_id: "r", filters: { industry: ["Retail"] } });
    const { body } = await call("export_csv", { session_id: "r", scope: "full" });
    expect(body).toMatchObject({ data: { scope: "full", filter_signature: "*", row_count: 3 } });
    expect(body).not.toHaveProperty("data.file");
  });

  it("rejects unsafe export file names", async () => {
    const result = await call("export_csv", { write_file: true, file_name: "../out.csv" });
    expect(result.isError).toBe(true);
    expect(fs.existsSync(path.join(dir, "out.csv"))).toBe(false);
  });

  it("reports dataset status", async () => {
    expect((await call("dataset_status")).body).toMatchObject({
      data: {
        source: "companies.csv",
        version: 1,
        counts: { companies: 3, incidents: 0, history: 0 },
        persistence: { presets: true, query_history: true },
      },
    });
  });

  it("reloads the dataset and keeps session filters", async () => {
    await call("set_filters", { session_id: "a", filters: { industry: ["Energy"] } });
    const reloaded = await call("reload_dataset");
    expect(reloaded.body).toMatchObject({ data: { previous_version: 1, version: 2 } });

    expect((await call("get_overview", { session_id: "a" })).body).toMatchObject({
      data: { overview: { companyCount: 2 } },
      attribution: expect.stringMatching(/\(v2, /),
    });
  });

  it("keeps serving the current dataset when a reload fails", async () => {
    fs.rmSync(companiesCsv);
    const failed = await call("reload_dataset");
    expect(failed.isError).toBe(true);
    expect(failed.body).toMatchObject({
      error: expect.stringMatching(/^Reload failed, still serving v1: /),
    });
    expect((await call("dataset_status")).body).toMatchObject({ data: { version: 1 } });
  });
});
