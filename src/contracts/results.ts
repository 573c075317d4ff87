// /src/contracts/results.ts
/**
 * Engine output contracts. Results are derived values: every call returns
 * fresh objects, nothing here is meant to be edited in place.
 */

import type { JobOffer } from "./offers";
import type { StateCode } from "../lib/tax/stateTables";

export type InputIssue = { path: string; message: string };

export type UnknownStateFailure = {
  code: "UNKNOWN_STATE";
  state: string;
  message: string;
};

export type InvalidInputFailure = {
  code: "INVALID_INPUT";
  message: string;
  issues: InputIssue[];
  /** Present when the failure belongs to a single readable offer. */
  offerId?: string;
};

export type EngineFailure = UnknownStateFailure | InvalidInputFailure;

export type EngineResult<T, E extends EngineFailure = EngineFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type ResolvedTaxContext = Readonly<{
  taxHomeState: StateCode;
  federalRate: number;
  stateRate: number;
  weeksWorked: number;
}>;

export type OfferComparisonResult = Readonly<{
  offerId: string;
  offer: JobOffer;

  weeklyTaxableIncome: number;
  weeklyTaxLiability: number;
  weeklyStipend: number;
  weeklyAmortizedBonus: number;
  weeklyNonTaxableIncome: number;
  weeklyGross: number;
  weeklyTakeHome: number;

  annualGross: number;
  annualTakeHome: number;

  blendedHourlyRate: number;
  /** Fraction of weekly gross paid non-taxable. */
  nonTaxableShare: number;
  /** Weekly tax liability / weekly gross. */
  effectiveTaxRate: number;

  /** 1 = highest annual take-home. */
  rank: number;
}>;

export type OfferComparison = Readonly<{
  results: readonly OfferComparisonResult[];
  /** Offers skipped for failing validation (skip-and-report). */
  rejected: readonly InvalidInputFailure[];
}>;

export type GSAComplianceResult = Readonly<{
  offerId: string;
  gsaDailyLodging: number;
  gsaDailyMeals: number;

  weeklyStipend: number;
  weeklyCeiling: number;
  isCompliant: boolean;
  /** Portion of the weekly stipend above the ceiling (potentially taxable). */
  excessAmount: number;

  housingWithinLimit: boolean;
  mealsWithinLimit: boolean;
  housingExcess: number;
  mealsExcess: number;
}>;
