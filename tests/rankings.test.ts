import { describe, it, expect } from "vitest";
import { findCompany, topCompanies } from "../src/domain/aggregation/rankings.js";
import { makeCompany } from "./fixtures.js";

describe("topCompanies", () => {
  const companies = [
    makeCompany({ name: "A", giving: 10, revenue: 100 }),
    makeCompany({ name: "B", giving: 30, revenue: null }),
    makeCompany({ name: "C", giving: 5, revenue: 20 }),
    makeCompany({ name: "D", giving: 10, revenue: 50 }),
  ];

  it("ranks by absolute giving with ties broken by name", () => {
    const rows = topCompanies(companies, "giving", 3);
    expect(rows.map((r) => [r.rank, r.name])).toEqual([
      [1, "B"],
      [2, "A"],
      [3, "D"],
    ]);
    expect(rows[0].givingPctOfRevenue).toBeNull();
  });

  it("ranks by giving share and leaves out companies without revenue", () => {
    const rows = topCompanies(companies, "givingPctOfRevenue", 10);
    expect(rows.map((r) => r.name)).toEqual(["C", "D", "A"]);
    expect(rows[0].givingPctOfRevenue).toBe(25);
  });

  it("returns nothing for a non-positive limit", () => {
    expect(topCompanies(companies, "giving", 0)).toEqual([]);
  });
});

describe("findCompany", () => {
  const companies = [
    makeCompany({ name: "Greenfield" }),
    makeCompany({ name: "Green Co" }),
    makeCompany({ name: "Evergreen" }),
    makeCompany({ name: "Bluewater" }),
  ];

  it("takes the first match in name order", () => {
    const match = findCompany(companies, "green");
    expect(match?.company.name).toBe("Evergreen");
    expect(match?.totalMatches).toBe(3);
    expect(match?.otherMatches).toEqual(["Green Co", "Greenfield"]);
  });

  it("prefers an exact match, ignoring case and surrounding space", () => {
    const match = findCompany(companies, "  GREEN CO ");
    expect(match?.company.name).toBe("Green Co");
    expect(match?.otherMatches).toEqual([]);
  });

  it("returns null for no match or a blank query", () => {
    expect(findCompany(companies, "solar")).toBeNull();
    expect(findCompany(companies, "   ")).toBeNull();
  });
});
