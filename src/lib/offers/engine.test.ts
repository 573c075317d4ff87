// /src/lib/offers/engine.test.ts
import { describe, it, expect } from "vitest";

import type { JobOffer } from "@/contracts";
import { createOfferComparisonEngine } from "./engine";

const offerA: JobOffer = {
  id: "A",
  location: "Los Angeles, CA",
  hourlyRate: 50,
  hoursPerWeek: 36,
  housingStipend: 1000,
  mealsStipend: 500,
  contractWeeks: 13,
};

const offerB: JobOffer = {
  id: "B",
  hourlyRate: 45,
  hoursPerWeek: 36,
  housingStipend: 1200,
  mealsStipend: 600,
  contractWeeks: 13,
};

describe("createOfferComparisonEngine", () => {
  it("uses the bundled state table by default", () => {
    const engine = createOfferComparisonEngine();

    expect(engine.getStateTaxRate("TX")).toEqual({ ok: true, value: 0 });
    expect(engine.getStateTaxRate("ca")).toEqual({ ok: true, value: 0.093 });
    expect(engine.gsaDefaults).toEqual({ dailyLodging: 107, dailyMeals: 79 });
  });

  it("uses an injected state table without falling back to the bundled one", () => {
    const engine = createOfferComparisonEngine({ stateRates: { CA: 0.1 } });

    expect(engine.getStateTaxRate("CA")).toEqual({ ok: true, value: 0.1 });
    expect(engine.getStateTaxRate("TX")).toEqual({ ok: true, value: 0 });

    const ny = engine.getStateTaxRate("NY");
    expect(ny.ok).toBe(false);
    if (!ny.ok) expect(ny.error.code).toBe("UNKNOWN_STATE");
  });

  it("resolves the tax context from the tax home", () => {
    const engine = createOfferComparisonEngine();

    expect(engine.resolveTaxContext({ taxHomeState: "or", federalRate: 0.22, weeksWorked: 48 })).toEqual({
      ok: true,
      value: { taxHomeState: "OR", federalRate: 0.22, stateRate: 0.09, weeksWorked: 48 },
    });
  });

  it("fails context resolution on unknown states and bad settings", () => {
    const engine = createOfferComparisonEngine();

    const unknown = engine.resolveTaxContext({ taxHomeState: "ZZ", federalRate: 0.22, weeksWorked: 48 });
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error.code).toBe("UNKNOWN_STATE");

    const badRate = engine.resolveTaxContext({ taxHomeState: "TX", federalRate: 2, weeksWorked: 48 });
    expect(badRate.ok).toBe(false);
    if (!badRate.ok) {
      expect(badRate.error.code).toBe("INVALID_INPUT");
      if (badRate.error.code === "INVALID_INPUT") {
        expect(badRate.error.issues.map((i) => i.path)).toEqual(["federalRate"]);
      }
    }
  });

  it("taxes by tax-home state, not assignment location", () => {
    const engine = createOfferComparisonEngine();
    const result = engine.compareOffersForContext([offerA, offerB], {
      taxHomeState: "TX",
      federalRate: 0.22,
      weeksWorked: 48,
    });
    if (!result.ok) throw new Error("expected success");

    expect(result.value.taxContext.stateRate).toBe(0);
    expect(result.value.results.map((r) => r.offerId)).toEqual(["B", "A"]);

    const a = result.value.results.find((r) => r.offerId === "A");
    expect(a?.weeklyTaxLiability).toBe(396);
  });

  it("does not compare with a guessed rate when the state is unknown", () => {
    const engine = createOfferComparisonEngine();
    const result = engine.compareOffersForContext([offerA], {
      taxHomeState: "PR",
      federalRate: 0.22,
      weeksWorked: 48,
    });

    expect(result).toEqual({
      ok: false,
      error: { code: "UNKNOWN_STATE", state: "PR", message: 'No tax rate configured for state "PR".' },
    });
  });

  it("checks compliance against the offer's locality rates", () => {
    const engine = createOfferComparisonEngine({
      gsaLocalities: { "san diego, ca": { dailyLodging: 197, dailyMeals: 79 } },
    });
    const offer: JobOffer = { ...offerA, location: "San Diego, CA", housingStipend: 1379, mealsStipend: 553 };

    const local = engine.checkOfferCompliance(offer);
    if (!local.ok) throw new Error("expected success");
    expect(local.value.weeklyCeiling).toBe(1932);
    expect(local.value.isCompliant).toBe(true);

    const elsewhere = engine.checkOfferCompliance({ ...offer, location: "Reno, NV" });
    if (!elsewhere.ok) throw new Error("expected success");
    expect(elsewhere.value.weeklyCeiling).toBe(1302);
    expect(elsewhere.value.isCompliant).toBe(false);
    expect(elsewhere.value.excessAmount).toBe(630);
  });

  it("uses injected GSA defaults", () => {
    const engine = createOfferComparisonEngine({ gsaDefaults: { dailyLodging: 100, dailyMeals: 50 } });

    expect(engine.resolveGsaRates()).toEqual({ dailyLodging: 100, dailyMeals: 50 });

    const result = engine.checkOfferCompliance(offerB);
    expect(result.ok && result.value.weeklyCeiling).toBe(1050);
  });

  it("suggests a federal rate from annual taxable income", () => {
    const engine = createOfferComparisonEngine();

    expect(engine.estimateFederalRate(90_000)).toBe(0.22);
    expect(engine.estimateFederalRate(90_000, "mfj")).toBe(0.12);
  });

  it("estimates an effective federal rate from annual wages", () => {
    const engine = createOfferComparisonEngine();

    // single: taxable 85,000 -> 1,192.50 + 4,386 + 8,035.50 = 13,614
    expect(engine.estimateFederalEffectiveRate(100_000)).toBe(0.1361);
    // mfj: taxable 70,000 -> 2,385 + 5,538 = 7,923
    expect(engine.estimateFederalEffectiveRate(100_000, "mfj")).toBe(0.0792);
  });

  it("recomputes identical answers across calls", () => {
    const engine = createOfferComparisonEngine();
    const settings = { taxHomeState: "CA", federalRate: 0.24, weeksWorked: 46 };

    expect(engine.compareOffersForContext([offerA, offerB], settings)).toEqual(
      engine.compareOffersForContext([offerA, offerB], settings),
    );
  });
});
