import type { Region } from "./types.js";

// US Census regions; DC counted with the South.
const REGION_STATES: Record<Region, string> = {
  Northeast: "CT ME MA NH RI VT NJ NY PA",
  Midwest: "IL IN MI OH WI IA KS MN MO NE ND SD",
  South: "DE DC FL GA MD NC SC VA WV AL KY MS TN AR LA OK TX",
  West: "AZ CO ID MT NV NM UT WY AK CA HI OR WA",
};

const STATE_TO_REGION = new Map<string, Region>();
for (const [region, states] of Object.entries(REGION_STATES)) {
  for (const code of states.split(" ")) {
    if (isRegion(region)) STATE_TO_REGION.set(code, region);
  }
}

export function isRegion(value: string): value is Region {
  return Object.hasOwn(REGION_STATES, value);
}

export function regionForState(state: string): Region | null {
  return STATE_TO_REGION.get(state.trim().toUpperCase()) ?? null;
}

export function isKnownState(state: string): boolean {
  return STATE_TO_REGION.has(state.trim().toUpperCase());
}
