// /src/lib/offers/report.ts

import type {
  EngineResult,
  GSAComplianceResult,
  GsaDailyRates,
  OfferComparisonResult,
  TaxSettings,
} from "../../contracts";
import { asStateCode, isNoIncomeTaxState } from "../tax/stateTables";
import type { ContextComparison, OfferComparisonEngine } from "./engine";

export type ComparisonReport = Readonly<{
  comparison: EngineResult<ContextComparison>;
  bestOffer: OfferComparisonResult | null;
  /** Keyed by offer id; ranked offers only. Offer ids are caller-chosen, so never plain-object keys. */
  compliance: ReadonlyMap<string, GSAComplianceResult>;
  /** Estimated annual stipend tax savings per offer id. */
  savings: ReadonlyMap<string, number>;
  noIncomeTaxState: boolean;
}>;

/**
 * Comparison plus per-offer GSA compliance and stipend savings.
 * @param gsa Fixed rates for every offer, or null to use each offer's locality.
 */
export function buildComparisonReport(
  engine: OfferComparisonEngine,
  offers: readonly unknown[],
  settings: TaxSettings,
  gsa: GsaDailyRates | null,
): ComparisonReport {
  const comparison = engine.compareOffersForContext(offers, settings);
  const compliance = new Map<string, GSAComplianceResult>();
  const savings = new Map<string, number>();

  if (comparison.ok) {
    const { federalRate, stateRate, weeksWorked } = comparison.value.taxContext;

    for (const row of comparison.value.results) {
      const checked = gsa
        ? engine.checkGSACompliance(row.offer, gsa.dailyLodging, gsa.dailyMeals)
        : engine.checkOfferCompliance(row.offer);
      if (checked.ok) compliance.set(row.offerId, checked.value);

      const saved = engine.calculateStipendTaxSavings(row.offer, federalRate, stateRate, weeksWorked);
      if (saved.ok) savings.set(row.offerId, saved.value);
    }
  }

  const code = asStateCode(settings.taxHomeState);

  return {
    comparison,
    bestOffer: comparison.ok ? comparison.value.results[0] ?? null : null,
    compliance,
    savings,
    noIncomeTaxState: code !== null && isNoIncomeTaxState(code),
  };
}
