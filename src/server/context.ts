import path from "path";
import { loadConfig, PROJECT_ROOT, type AppConfig } from "../core/config.js";
import { getErrorMessage, logError, logInfo } from "../core/logging.js";
import { DatasetLoader } from "../data-sources/dataset-loader.js";
import { FilterPresetStore } from "../data-sources/filter-preset-store.js";
import { QueryHistoryStore } from "../data-sources/query-history-store.js";
import { ensureSqlJs } from "../data-sources/sqlite-adapter.js";
import { AggregateCache } from "../domain/dashboard/aggregate-cache.js";
import { DashboardService } from "../domain/dashboard/dashboard-service.js";
import { SessionRegistry } from "../domain/dashboard/session-registry.js";

export const SAMPLE_VOCABULARY_PATH = path.join(PROJECT_ROOT, "data", "sample-vocabulary.json");

export interface ServerContext {
  config: AppConfig;
  loader: DatasetLoader;
  dashboard: DashboardService;
  sessions: SessionRegistry;
  presetStore: FilterPresetStore | undefined;
  queryHistoryStore: QueryHistoryStore | undefined;
}

/**
 * Create and initialize the full server context.
 * All instantiation + async init happens here (not at module import time).
 * A dataset that cannot be loaded is fatal; the SQLite stores are optional.
 */
export async function createServerContext(): Promise<ServerContext> {
  // sql.js WASM must load before any SQLite operations
  await ensureSqlJs();

  const config = loadConfig();
  const loader = new DatasetLoader(config.dataset, SAMPLE_VOCABULARY_PATH);
  const dataset = await loader.load();

  const dashboard = new DashboardService(
    dataset,
    config.leadership,
    new AggregateCache(config.cacheMaxEntries),
  );

  let presetStore: FilterPresetStore | undefined;
  let queryHistoryStore: QueryHistoryStore | undefined;

  // Filter presets own the dashboard database
  try {
    const store = new FilterPresetStore(config.dataDir);
    store.initialize();
    presetStore = store;
  } catch (err) {
    logError(
      "FilterPresetStore initialization failed (presets disabled):",
      getErrorMessage(err),
    );
  }

  // Query history shares the SQLite db with FilterPresetStore
  if (presetStore) {
    try {
      const historyStore = new QueryHistoryStore();
      historyStore.initialize(presetStore.getDatabase());
      queryHistoryStore = historyStore;
    } catch (err) {
      logError(
        "QueryHistoryStore initialization failed (query logging disabled):",
        getErrorMessage(err),
      );
    }
  }

  logInfo(
    `Leadership policy: ${config.leadership.banding.mode} banding, ${config.leadership.givingBasis} giving basis`,
  );

  return {
    config,
    loader,
    dashboard,
    sessions: new SessionRegistry(),
    presetStore,
    queryHistoryStore,
  };
}

export function closeServerContext(ctx: ServerContext): void {
  ctx.queryHistoryStore?.close();
  ctx.presetStore?.close();
}
