import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { DB_FILENAME, FilterPresetStore } from "../src/data-sources/filter-preset-store.js";
import { ensureSqlJs } from "../src/data-sources/sqlite-adapter.js";
import { filterSignature } from "../src/domain/filters/filter-engine.js";

describe("FilterPresetStore", () => {
  let store: FilterPresetStore;

  beforeAll(async () => {
    await ensureSqlJs();
  });

  beforeEach(() => {
    store = new FilterPresetStore(null);
    store.initialize();
  });

  afterEach(() => {
    store.close();
  });

  it("saves and reads back a preset", () => {
    const filters = { industry: ["Energy"], yearRange: { from: 2021 } };
    const preset = store.save(" West energy ", filters);

    expect(preset.name).toBe("West energy");
    expect(preset.filters).toEqual(filters);
    expect(preset.signature).toBe(filterSignature(filters));
    expect(store.get("West energy")?.filters).toEqual(filters);
  });

  it("replaces a preset saved under the same name", () => {
    store.save("mine", { state: ["CA"] });
    store.save("mine", { state: ["TX"] });

    const presets = store.list();
    expect(presets).toHaveLength(1);
    expect(presets[0].filters).toEqual({ state: ["TX"] });
  });

  it("lists presets by name", () => {
    store.save("b", {});
    store.save("a", { size: ["Large"] });
    expect(store.list().map((p) => p.name)).toEqual(["a", "b"]);
  });

  it("deletes presets", () => {
    store.save("temp", {});
    expect(store.delete("temp")).toBe(true);
    expect(store.delete("temp")).toBe(false);
    expect(store.get("temp")).toBeNull();
  });

  it("validates names", () => {
    expect(() => store.save("  ", {})).toThrow("Preset name must not be empty");
    expect(() => store.save("a/b", {})).toThrow('Invalid preset name "a/b"');
    expect(() => store.save("x".repeat(81), {})).toThrow("Preset name exceeds 80 characters");
  });

  it("throws when not initialized", () => {
    expect(() => new FilterPresetStore(null).list()).toThrow("not initialized");
  });

  it("persists presets across restarts", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "filter-presets-"));
    try {
      const first = new FilterPresetStore(dir);
      first.initialize();
      first.save("kept", { region: ["West"] });
      first.close();
      expect(fs.existsSync(path.join(dir, DB_FILENAME))).toBe(true);

      const second = new FilterPresetStore(dir);
      second.initialize();
      expect(second.get("kept")?.filters).toEqual({ region: ["West"] });
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
