// /src/lib/config/engineConfig.test.ts
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { DEFAULT_STATE_RATES, RateTableParseError } from "@/lib/tax/stateTables";
import {
  EngineConfigError,
  createEngineFromConfig,
  loadEngineConfig,
  parseGsaLocalityFile,
} from "./engineConfig";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "offer-config-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, JSON.stringify(value), "utf8");
  return file;
}

describe("loadEngineConfig", () => {
  it("falls back to defaults when nothing is set", async () => {
    const config = await loadEngineConfig({});

    expect(config.defaultFederalRate).toBe(0.22);
    expect(config.defaultWeeksWorked).toBe(48);
    expect(config.gsaDefaults).toEqual({ dailyLodging: 107, dailyMeals: 79 });
    expect(config.stateRates).toBe(DEFAULT_STATE_RATES);
    expect(config.stateRatesTaxYear).toBe(2024);
    expect(config.gsaLocalities).toEqual({});
  });

  it("coerces numeric env strings", async () => {
    const config = await loadEngineConfig({
      OFFER_DEFAULT_FEDERAL_RATE: "0.24",
      OFFER_DEFAULT_WEEKS_WORKED: "50",
      GSA_DEFAULT_DAILY_LODGING: "110",
      GSA_DEFAULT_DAILY_MEALS: "80",
    });

    expect(config.defaultFederalRate).toBe(0.24);
    expect(config.defaultWeeksWorked).toBe(50);
    expect(config.gsaDefaults).toEqual({ dailyLodging: 110, dailyMeals: 80 });
  });

  it("treats blank variables as unset", async () => {
    const config = await loadEngineConfig({
      OFFER_DEFAULT_FEDERAL_RATE: "",
      GSA_DEFAULT_DAILY_LODGING: "",
      GSA_DEFAULT_DAILY_MEALS: "  ",
      STATE_RATES_PATH: "",
    });

    expect(config.defaultFederalRate).toBe(0.22);
    expect(config.gsaDefaults).toEqual({ dailyLodging: 107, dailyMeals: 79 });
    expect(config.stateRates).toBe(DEFAULT_STATE_RATES);
  });

  it("rejects values that are not numbers", async () => {
    await expect(loadEngineConfig({ GSA_DEFAULT_DAILY_MEALS: "seventy" })).rejects.toBeInstanceOf(
      EngineConfigError,
    );
  });

  it("rejects out-of-range values", async () => {
    await expect(loadEngineConfig({ OFFER_DEFAULT_WEEKS_WORKED: "60" })).rejects.toBeInstanceOf(
      EngineConfigError,
    );
    await expect(loadEngineConfig({ OFFER_DEFAULT_FEDERAL_RATE: "1.5" })).rejects.toThrow(
      "Invalid offer engine environment.",
    );
  });

  it("replaces the state table from STATE_RATES_PATH", async () => {
    const file = await writeJson("rates.json", { taxYear: 2025, rates: { CA: 0.1, TX: 0.02 } });
    const config = await loadEngineConfig({ STATE_RATES_PATH: file });
    const engine = createEngineFromConfig(config);

    expect(config.stateRatesTaxYear).toBe(2025);
    expect(engine.getStateTaxRate("CA")).toEqual({ ok: true, value: 0.1 });
    expect(engine.getStateTaxRate("TX")).toEqual({ ok: true, value: 0 });
    expect(engine.getStateTaxRate("NY").ok).toBe(false);
  });

  it("loads GSA localities from GSA_LOCALITIES_PATH", async () => {
    const file = await writeJson("gsa.json", { "Denver, CO": { dailyLodging: 199, dailyMeals: 92 } });
    const config = await loadEngineConfig({ GSA_LOCALITIES_PATH: file });
    const engine = createEngineFromConfig(config);

    expect(config.gsaLocalities).toEqual({ "denver, co": { dailyLodging: 199, dailyMeals: 92 } });
    expect(engine.resolveGsaRates("DENVER, co")).toEqual({ dailyLodging: 199, dailyMeals: 92 });
  });

  it("fails on unparseable rate files", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ not json", "utf8");

    await expect(loadEngineConfig({ STATE_RATES_PATH: file })).rejects.toBeInstanceOf(RateTableParseError);
  });
});

describe("parseGsaLocalityFile", () => {
  it("rejects negative rates", () => {
    expect(() => parseGsaLocalityFile({ "Austin, TX": { dailyLodging: -1, dailyMeals: 79 } })).toThrow(
      "Invalid GSA locality file.",
    );
  });
});
