/**
 * Demo: Generate the seeded sample dataset and print a few dashboard views.
 * Usage: npx tsx scripts/demo.ts
 */
import { loadConfig } from '../src/core/config.js';
import { DatasetLoader } from '../src/data-sources/dataset-loader.js';
import { metricValue } from '../src/domain/aggregation/aggregator.js';
import { round } from '../src/domain/aggregation/statistics.js';
import type { MetricResult } from '../src/domain/aggregation/types.js';
import { AggregateCache } from '../src/domain/dashboard/aggregate-cache.js';
import { DashboardService } from '../src/domain/dashboard/dashboard-service.js';
import type { FilterSet } from '../src/domain/filters/types.js';
import { SAMPLE_VOCABULARY_PATH } from '../src/server/context.js';

const fmt = (m: MetricResult, suffix = ''): string => {
  const v = metricValue(m);
  return v === null ? 'n/a' : `${round(v)}${suffix}`;
};

// ── Run ─────────────────────────────────────────────────────────────
const config = loadConfig();
const loader = new DatasetLoader({ ...config.dataset, companiesCsv: undefined }, SAMPLE_VOCABULARY_PATH);
const dataset = await loader.load();
const dashboard = new DashboardService(dataset, config.leadership, new AggregateCache(config.cacheMaxEntries));

const scenarios: { label: string; filters: FilterSet }[] = [
  { label: 'All companies', filters: {} },
  { label: 'West region', filters: { region: ['West'] } },
  { label: 'Energy, 2022 onward', filters: { industry: ['Energy'], yearRange: { from: 2022 } } },
];

console.log('═══════════════════════════════════════════════════════════');
console.log('  Environmental Giving Dashboard Demo');
console.log(`  ${dataset.source}: ${dataset.companies.length} companies, ${dataset.incidents.length} incidents`);
console.log('═══════════════════════════════════════════════════════════\n');

for (const { label, filters } of scenarios) {
  const overview = dashboard.overview(filters);
  const leadership = dashboard.leadership(filters);
  const industries = dashboard.breakdown(filters, 'industry');

  console.log(`┌─ ${label}`);
  console.log(`│  Companies: ${overview.companyCount}  Giving: $${round(overview.totalGiving)}M  ` +
    `% of revenue: ${fmt(overview.givingPctOfRevenue, '%')}  Avg transparency: ${fmt(overview.avgTransparency)}`);

  console.log(`│  ── Top industries ──`);
  for (const g of industries.groups.slice(0, 3)) {
    console.log(`│    ${g.key.padEnd(22)} $${round(g.totalGiving)}M  (${fmt(g.sharePct, '%')})`);
  }

  console.log(`│  ── Leadership (${leadership.thresholds?.mode ?? 'none'}) ──`);
  for (const [band, count] of Object.entries(leadership.bandCounts)) {
    console.log(`│    ${band.padEnd(14)} ${count}`);
  }
  for (const s of leadership.leaders.slice(0, 3)) {
    console.log(`│    #${s.rank} ${s.name} ${s.score}`);
  }
  console.log(`└${'─'.repeat(58)}\n`);
}

console.log(`Cache: ${JSON.stringify(dashboard.cacheStats())}`);
