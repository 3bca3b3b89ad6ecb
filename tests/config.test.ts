import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import {
  PROJECT_ROOT,
  loadConfig,
  loadDatasetConfig,
  loadLeadershipPolicy,
  validateDatasetConfig,
  validateLeadershipPolicy,
} from '../src/core/config.js';
import type { DatasetSourceConfig } from '../src/domain/dataset/types.js';
import { makePolicy } from './fixtures.js';

const ENV_KEYS = [
  'LEADERSHIP_BANDING',
  'LEADERSHIP_FIXED_THRESHOLDS',
  'LEADERSHIP_SPREAD',
  'LEADERSHIP_GIVING_BASIS',
  'LEADERSHIP_WEIGHT_GIVING',
  'LEADERSHIP_WEIGHT_TRANSPARENCY',
  'LEADERSHIP_WEIGHT_CONSISTENCY',
  'LEADERSHIP_WEIGHT_IMPACT',
  'LEADERSHIP_WEIGHT_INCIDENTS',
  'LEADERSHIP_LIST_SIZE',
  'COMPANIES_CSV',
  'INCIDENTS_CSV',
  'HISTORY_CSV',
  'GIVING_UNITS',
  'DATASET_MAX_DOWNLOAD_BYTES',
  'DATASET_DOWNLOAD_TIMEOUT_MS',
  'SAMPLE_SEED',
  'SAMPLE_COMPANY_COUNT',
  'DATA_DIR',
  'AGGREGATE_CACHE_MAX_ENTRIES',
];
const saved: Record<string, string | undefined> = {};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    if (saved[key] === undefined) delete process.env[key];
    else process.env[key] = saved[key];
  }
});

describe('validateLeadershipPolicy', () => {
  it('accepts the default policy', () => {
    expect(() => validateLeadershipPolicy(makePolicy())).not.toThrow();
  });

  // --- Weight validation ---

  it('rejects weights that do not sum to 100', () => {
    const p = makePolicy({
      weights: { giving: 50, transparency: 30, consistency: 15, impact: 10, incidents: 10 },
    });
    expect(() => validateLeadershipPolicy(p)).toThrow(/Weights must sum to 100, got 115/);
  });

  it('rejects negative weights', () => {
    const p = makePolicy({
      weights: { giving: -10, transparency: 75, consistency: 15, impact: 10, incidents: 10 },
    });
    expect(() => validateLeadershipPolicy(p)).toThrow(/non-negative/);
  });

  it('accepts a zero weight (disabling a component)', () => {
    const p = makePolicy({
      weights: { giving: 45, transparency: 30, consistency: 15, impact: 10, incidents: 0 },
    });
    expect(() => validateLeadershipPolicy(p)).not.toThrow();
  });

  // --- Banding ---

  it('rejects descending fixed thresholds', () => {
    const p = makePolicy({ banding: { mode: 'fixed', thresholds: [60, 40, 80] } });
    expect(() => validateLeadershipPolicy(p)).toThrow(/ascending/);
  });

  it('rejects fixed thresholds outside 0-100', () => {
    const p = makePolicy({ banding: { mode: 'fixed', thresholds: [40, 60, 120] } });
    expect(() => validateLeadershipPolicy(p)).toThrow(/between 0 and 100/);
  });

  it('rejects a negative spread', () => {
    const p = makePolicy({ banding: { mode: 'average-relative', spread: -1 } });
    expect(() => validateLeadershipPolicy(p)).toThrow(/spread/);
  });

  it('reports multiple errors at once', () => {
    const p = makePolicy({
      weights: { giving: -5, transparency: 30, consistency: 15, impact: 10, incidents: 10 },
      listSize: 0,
    });
    expect(() => validateLeadershipPolicy(p)).toThrow(
      'Invalid leadership policy:\n  - All weights must be non-negative\n' +
        '  - Weights must sum to 100, got 60\n  - listSize must be a positive integer',
    );
  });
});

describe('loadLeadershipPolicy', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadLeadershipPolicy()).toEqual(makePolicy());
  });

  it('reads weights, basis and list size', () => {
    process.env.LEADERSHIP_WEIGHT_GIVING = '45';
    process.env.LEADERSHIP_WEIGHT_INCIDENTS = '0';
    process.env.LEADERSHIP_GIVING_BASIS = ' Absolute ';
    process.env.LEADERSHIP_LIST_SIZE = '500';
    const p = loadLeadershipPolicy();
    expect(p.weights.giving).toBe(45);
    expect(p.weights.incidents).toBe(0);
    expect(p.givingBasis).toBe('absolute');
    expect(p.listSize).toBe(100);
  });

  it('ignores non-integer weights', () => {
    process.env.LEADERSHIP_WEIGHT_GIVING = '35.5';
    expect(loadLeadershipPolicy().weights.giving).toBe(35);
  });

  it('reads fixed thresholds', () => {
    process.env.LEADERSHIP_BANDING = 'fixed';
    process.env.LEADERSHIP_FIXED_THRESHOLDS = '30, 50, 70';
    expect(loadLeadershipPolicy().banding).toEqual({ mode: 'fixed', thresholds: [30, 50, 70] });
  });

  it('uses the default fixed thresholds when none are given', () => {
    process.env.LEADERSHIP_BANDING = 'fixed';
    expect(loadLeadershipPolicy().banding).toEqual({ mode: 'fixed', thresholds: [40, 60, 80] });
  });

  it('rejects fixed banding without three thresholds', () => {
    process.env.LEADERSHIP_BANDING = 'fixed';
    process.env.LEADERSHIP_FIXED_THRESHOLDS = '30,50';
    expect(() => loadLeadershipPolicy()).toThrow('Fixed thresholds need 3 values, got 2');
  });

  it('rejects an unknown banding mode', () => {
    process.env.LEADERSHIP_BANDING = 'quartlie';
    expect(() => loadConfig()).toThrow('Unknown banding mode "quartlie"');
  });

  it('lists load problems together with policy problems', () => {
    process.env.LEADERSHIP_BANDING = 'quartlie';
    process.env.LEADERSHIP_GIVING_BASIS = 'share';
    process.env.LEADERSHIP_WEIGHT_GIVING = '50';
    expect(() => loadLeadershipPolicy()).toThrow(
      'Invalid leadership policy:\n  - Unknown giving basis "share"\n' +
        '  - Unknown banding mode "quartlie"\n  - Weights must sum to 100, got 115',
    );
  });

  it('reads average-relative banding with its spread', () => {
    process.env.LEADERSHIP_BANDING = 'average';
    process.env.LEADERSHIP_SPREAD = '1';
    expect(loadLeadershipPolicy().banding).toEqual({ mode: 'average-relative', spread: 1 });
  });
});

describe('validateDatasetConfig', () => {
  function makeDatasetConfig(overrides: Partial<DatasetSourceConfig> = {}): DatasetSourceConfig {
    return {
      givingUnits: 'millions',
      maxDownloadBytes: 1024,
      downloadTimeoutMs: 1000,
      sampleSeed: 42,
      sampleCompanyCount: 10,
      ...overrides,
    };
  }

  it('accepts file paths and https URLs', () => {
    expect(() =>
      validateDatasetConfig(
        makeDatasetConfig({ companiesCsv: 'data/companies.csv', incidentsCsv: 'https://example.com/i.csv' }),
      ),
    ).not.toThrow();
  });

  it('rejects other URL schemes', () => {
    expect(() =>
      validateDatasetConfig(makeDatasetConfig({ companiesCsv: 'http://example.com/c.csv' })),
    ).toThrow(/COMPANIES_CSV must be a file path or an https:\/\/ URL/);
  });

  it('requires companies when incidents or history are set', () => {
    expect(() =>
      validateDatasetConfig(makeDatasetConfig({ historyCsv: 'history.csv' })),
    ).toThrow(/require COMPANIES_CSV/);
  });
});

describe('loadConfig', () => {
  it('falls back to the sample dataset under the project data directory', () => {
    const config = loadConfig();
    expect(config.dataset.companiesCsv).toBeUndefined();
    expect(config.dataset.givingUnits).toBe('millions');
    expect(config.dataset.sampleSeed).toBe(42);
    expect(config.dataset.sampleCompanyCount).toBe(500);
    expect(config.dataDir).toBe(path.join(PROJECT_ROOT, 'data'));
    expect(config.cacheMaxEntries).toBe(500);
  });

  it('clamps numeric settings', () => {
    process.env.SAMPLE_COMPANY_COUNT = '0';
    process.env.DATASET_DOWNLOAD_TIMEOUT_MS = '5';
    process.env.GIVING_UNITS = 'DOLLARS';
    const dataset = loadDatasetConfig();
    expect(dataset.sampleCompanyCount).toBe(1);
    expect(dataset.downloadTimeoutMs).toBe(1000);
    expect(dataset.givingUnits).toBe('dollars');
  });

  it('resolves DATA_DIR to an absolute path', () => {
    process.env.DATA_DIR = 'relative/data';
    expect(loadConfig().dataDir).toBe(path.resolve('relative/data'));
  });
});
