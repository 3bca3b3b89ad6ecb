import type {
  Company,
  Dataset,
  HistoryRecord,
  Incident,
} from "../src/domain/dataset/types.js";
import type { LeadershipPolicy } from "../src/domain/leadership/types.js";

/**
 * A complete company with neutral defaults. Tests override only the fields
 * they exercise.
 */
export function makeCompany(overrides: Partial<Company> = {}): Company {
  return {
    name: "Acme Corp",
    state: "CA",
    region: "West",
    industry: "Energy",
    size: "Large",
    revenue: 1000,
    giving: 10,
    localGiving: null,
    transparencyScore: 50,
    esgScore: 50,
    impactScore: 50,
    lossContingencies: null,
    remediationExpenses: null,
    incidentCount: null,
    reportingLevel: "Standard",
    years: [2022],
    causeAreas: {},
    ...overrides,
  };
}

export function makeIncident(overrides: Partial<Incident> = {}): Incident {
  return {
    companyName: "Acme Corp",
    state: "CA",
    latitude: 34,
    longitude: -118,
    type: "Spill",
    severity: 3,
    remediationCost: 1,
    inEnvironmentalJusticeCommunity: false,
    year: 2022,
    promptDisclosure: null,
    ...overrides,
  };
}

export function makeHistory(overrides: Partial<HistoryRecord> = {}): HistoryRecord {
  return {
    companyName: "Acme Corp",
    year: 2022,
    giving: 10,
    revenue: 1000,
    transparencyScore: 50,
    ...overrides,
  };
}

export function makeDataset(
  parts: {
    companies?: Company[];
    incidents?: Incident[];
    history?: HistoryRecord[];
  } = {},
  version = 1,
): Dataset {
  const companies = parts.companies ?? [];
  const incidents = parts.incidents ?? [];
  const history = parts.history ?? [];
  return {
    version,
    source: "test",
    loadedAt: "2024-01-01T00:00:00.000Z",
    companies,
    incidents,
    history,
    report: {
      companies: { loaded: companies.length, skipped: 0 },
      incidents: { loaded: incidents.length, skipped: 0 },
      history: { loaded: history.length, skipped: 0 },
      skippedRows: [],
    },
  };
}

/** Default weights with quartile banding. */
export function makePolicy(overrides: Partial<LeadershipPolicy> = {}): LeadershipPolicy {
  return {
    weights: {
      giving: 35,
      transparency: 30,
      consistency: 15,
      impact: 10,
      incidents: 10,
    },
    givingBasis: "revenue_share",
    banding: { mode: "quartile" },
    listSize: 10,
    ...overrides,
  };
}
