// /src/lib/offers/engine.ts
/**
 * OfferComparisonEngine factory.
 *
 * Rate table and GSA defaults are passed in explicitly; nothing is read from
 * globals at call time. The engine keeps no state between calls: identical
 * inputs always recompute to identical outputs.
 */

import {
  TaxSettingsSchema,
  type EngineResult,
  type GSAComplianceResult,
  type GsaDailyRates,
  type InvalidInputFailure,
  type JobOffer,
  type OfferComparison,
  type OfferComparisonResult,
  type ResolvedTaxContext,
  type TaxSettings,
  type UnknownStateFailure,
} from "../../contracts";
import {
  DEFAULT_STATE_RATES,
  estimateFederalEffectiveRate2025,
  estimateFederalMarginalRate2025,
  getStateTaxRate,
  lookupStateTaxRate,
  type FilingStatus2025,
  type StateRateTable,
} from "../tax";
import { compareOffers, findBestOffer } from "./compare";
import { invalidInput, issuesFromZod } from "./errors";
import {
  GSA_STANDARD_RATES,
  checkGSACompliance,
  resolveGsaRates,
  type GsaLocalityTable,
} from "./gsa";
import { calculateStipendTaxSavings } from "./savings";

export type OfferEngineOptions = {
  stateRates?: Readonly<StateRateTable>;
  gsaDefaults?: GsaDailyRates;
  gsaLocalities?: GsaLocalityTable;
};

export type ContextComparison = OfferComparison & { taxContext: ResolvedTaxContext };

export interface OfferComparisonEngine {
  readonly stateRates: Readonly<StateRateTable>;
  readonly gsaDefaults: GsaDailyRates;

  getStateTaxRate(state: string): EngineResult<number, UnknownStateFailure>;
  resolveTaxContext(settings: TaxSettings): EngineResult<ResolvedTaxContext>;

  compareOffers(
    offers: readonly unknown[],
    federalRate: number,
    stateRate: number,
    weeksWorked: number,
  ): EngineResult<OfferComparison, InvalidInputFailure>;
  compareOffersForContext(offers: readonly unknown[], settings: TaxSettings): EngineResult<ContextComparison>;
  findBestOffer(
    offers: readonly unknown[],
    federalRate: number,
    stateRate: number,
    weeksWorked: number,
  ): EngineResult<OfferComparisonResult | null, InvalidInputFailure>;

  checkGSACompliance(
    offer: JobOffer,
    gsaDailyLodging: number,
    gsaDailyMeals: number,
  ): EngineResult<GSAComplianceResult, InvalidInputFailure>;
  resolveGsaRates(location?: string): GsaDailyRates;
  checkOfferCompliance(offer: JobOffer): EngineResult<GSAComplianceResult, InvalidInputFailure>;

  calculateStipendTaxSavings(
    offer: JobOffer,
    federalRate: number,
    stateRate: number,
    weeksWorked: number,
  ): EngineResult<number, InvalidInputFailure>;

  /** Suggested federal rate: the 2025 marginal bracket for the income. */
  estimateFederalRate(annualTaxableIncome: number, filingStatus?: FilingStatus2025): number;
  /** 2025 tax after the standard deduction, as a share of annual taxable wages. */
  estimateFederalEffectiveRate(annualTaxableWages: number, filingStatus?: FilingStatus2025): number;
}

export function createOfferComparisonEngine(options: OfferEngineOptions = {}): OfferComparisonEngine {
  const stateRates = options.stateRates ?? DEFAULT_STATE_RATES;
  const gsaDefaults = options.gsaDefaults ?? GSA_STANDARD_RATES;
  const gsaLocalities = options.gsaLocalities ?? {};

  function resolveTaxContext(settings: TaxSettings): EngineResult<ResolvedTaxContext> {
    const parsed = TaxSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      return {
        ok: false,
        error: invalidInput("Tax settings are invalid.", issuesFromZod(parsed.error)),
      };
    }

    const state = lookupStateTaxRate(parsed.data.taxHomeState, stateRates);
    if (!state.ok) return state;

    return {
      ok: true,
      value: {
        taxHomeState: state.value.code,
        federalRate: parsed.data.federalRate,
        stateRate: state.value.rate,
        weeksWorked: parsed.data.weeksWorked,
      },
    };
  }

  return {
    stateRates,
    gsaDefaults,

    getStateTaxRate: (state) => getStateTaxRate(state, stateRates),
    resolveTaxContext,

    compareOffers,
    compareOffersForContext(offers, settings) {
      const context = resolveTaxContext(settings);
      if (!context.ok) return context;

      const { federalRate, stateRate, weeksWorked } = context.value;
      const compared = compareOffers(offers, federalRate, stateRate, weeksWorked);
      if (!compared.ok) return compared;

      return { ok: true, value: { ...compared.value, taxContext: context.value } };
    },
    findBestOffer,

    checkGSACompliance,
    resolveGsaRates: (location) => resolveGsaRates(location, gsaLocalities, gsaDefaults),
    checkOfferCompliance(offer) {
      const rates = resolveGsaRates(offer.location, gsaLocalities, gsaDefaults);
      return checkGSACompliance(offer, rates.dailyLodging, rates.dailyMeals);
    },

    calculateStipendTaxSavings,

    estimateFederalRate: (annualTaxableIncome, filingStatus = "single") =>
      estimateFederalMarginalRate2025(annualTaxableIncome, filingStatus),
    estimateFederalEffectiveRate: (annualTaxableWages, filingStatus = "single") =>
      estimateFederalEffectiveRate2025(annualTaxableWages, filingStatus),
  };
}
