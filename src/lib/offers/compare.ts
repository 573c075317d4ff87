// /src/lib/offers/compare.ts
/**
 * Offer ranking by annual take-home pay.
 *
 * Batch policy (skip-and-report):
 * - Shared inputs (rates, weeks worked) are all-or-nothing: one bad value fails the call.
 * - Each offer is validated on its own. Invalid or duplicate offers are left out of
 *   the ranking and listed in `rejected`.
 *
 * Ordering: annual take-home desc, then contract length asc, then id asc.
 */

import type {
  EngineResult,
  InvalidInputFailure,
  JobOffer,
  OfferComparison,
  OfferComparisonResult,
} from "../../contracts";
import {
  combinedTaxRate,
  computeWeeklyBreakdown,
  roundRate,
  roundToCents,
  weeklyHoursWorked,
} from "./compensation";
import { invalidInput } from "./errors";
import { validateOffer, validateRateInputs } from "./validate";

type UnrankedResult = Omit<OfferComparisonResult, "rank">;

function buildResult(offer: JobOffer, combinedRate: number, weeksWorked: number): UnrankedResult {
  const w = computeWeeklyBreakdown(offer, combinedRate);
  const hours = weeklyHoursWorked(offer);

  const weeklyGross = roundToCents(w.gross);
  const weeklyTakeHome = roundToCents(w.takeHome);

  return {
    offerId: offer.id,
    offer,

    weeklyTaxableIncome: roundToCents(w.taxableIncome),
    weeklyTaxLiability: roundToCents(w.taxLiability),
    weeklyStipend: roundToCents(w.stipend),
    weeklyAmortizedBonus: roundToCents(w.amortizedBonus),
    weeklyNonTaxableIncome: roundToCents(w.nonTaxableIncome),
    weeklyGross,
    weeklyTakeHome,

    annualGross: roundToCents(weeklyGross * weeksWorked),
    annualTakeHome: roundToCents(weeklyTakeHome * weeksWorked),

    blendedHourlyRate: hours > 0 ? roundToCents(w.gross / hours) : 0,
    nonTaxableShare: w.gross > 0 ? roundRate(w.nonTaxableIncome / w.gross) : 0,
    effectiveTaxRate: w.gross > 0 ? roundRate(w.taxLiability / w.gross) : 0,
  };
}

function byRank(a: UnrankedResult, b: UnrankedResult): number {
  if (a.annualTakeHome !== b.annualTakeHome) return b.annualTakeHome - a.annualTakeHome;
  if (a.offer.contractWeeks !== b.offer.contractWeeks) {
    return a.offer.contractWeeks - b.offer.contractWeeks;
  }
  if (a.offerId === b.offerId) return 0;
  return a.offerId < b.offerId ? -1 : 1;
}

/**
 * Compare offers under one tax context.
 * @param offers Offer records; each one is validated against JobOfferSchema.
 */
export function compareOffers(
  offers: readonly unknown[],
  federalRate: number,
  stateRate: number,
  weeksWorked: number,
): EngineResult<OfferComparison, InvalidInputFailure> {
  const inputs = validateRateInputs({ federalRate, stateRate, weeksWorked });
  if (!inputs.ok) return inputs;

  const combinedRate = combinedTaxRate(inputs.value.federalRate, inputs.value.stateRate);

  const unranked: UnrankedResult[] = [];
  const rejected: InvalidInputFailure[] = [];
  const seen = new Set<string>();

  for (const raw of offers) {
    const checked = validateOffer(raw);
    if (!checked.ok) {
      rejected.push(checked.error);
      continue;
    }

    const offer = checked.value;
    if (seen.has(offer.id)) {
      rejected.push(
        invalidInput(
          `Duplicate offer id "${offer.id}".`,
          [{ path: "id", message: "Offer ids must be unique within a comparison." }],
          offer.id,
        ),
      );
      continue;
    }
    seen.add(offer.id);

    unranked.push(buildResult(offer, combinedRate, inputs.value.weeksWorked));
  }

  const results = [...unranked].sort(byRank).map((r, index) => ({ ...r, rank: index + 1 }));

  return { ok: true, value: { results, rejected } };
}

/** Rank-1 result, or null when no offer survives validation. */
export function findBestOffer(
  offers: readonly unknown[],
  federalRate: number,
  stateRate: number,
  weeksWorked: number,
): EngineResult<OfferComparisonResult | null, InvalidInputFailure> {
  const compared = compareOffers(offers, federalRate, stateRate, weeksWorked);
  if (!compared.ok) return compared;
  return { ok: true, value: compared.value.results[0] ?? null };
}
