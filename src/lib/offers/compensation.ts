// /src/lib/offers/compensation.ts
/**
 * Weekly pay arithmetic for a single offer.
 *
 * Only wages (base + overtime) are taxed. Stipends and amortized bonuses are
 * added after tax.
 */

import type { JobOffer } from "../../contracts";

/** Money helpers (keep deterministic; avoid floating drift via consistent rounding). */
export function roundToCents(x: number): number {
  return Math.round((x + Number.EPSILON) * 100) / 100;
}
export function roundRate(x: number): number {
  return Math.round((x + Number.EPSILON) * 10_000) / 10_000;
}
function clampMin0(x: number): number {
  return x < 0 ? 0 : x;
}

/** Combined federal + state rate, clamped to [0, 1]. */
export function combinedTaxRate(federalRate: number, stateRate: number): number {
  return Math.min(1, clampMin0(federalRate + stateRate));
}

export function weeklyTaxableIncome(offer: JobOffer): number {
  const base = offer.hourlyRate * offer.hoursPerWeek;
  const overtime = (offer.overtimeRate ?? 0) * (offer.overtimeHours ?? 0);
  return base + overtime;
}

export function weeklyStipend(offer: JobOffer): number {
  return offer.housingStipend + offer.mealsStipend;
}

export function totalBonuses(offer: JobOffer): number {
  return (offer.completionBonus ?? 0) + (offer.signOnBonus ?? 0) + (offer.referralBonus ?? 0);
}

export function weeklyAmortizedBonus(offer: JobOffer): number {
  return totalBonuses(offer) / offer.contractWeeks;
}

export function weeklyHoursWorked(offer: JobOffer): number {
  return offer.hoursPerWeek + (offer.overtimeHours ?? 0);
}

export type WeeklyBreakdown = {
  taxableIncome: number;
  taxLiability: number;
  stipend: number;
  amortizedBonus: number;
  nonTaxableIncome: number;
  gross: number;
  takeHome: number;
};

/** Unrounded weekly figures; callers round once at the edge. */
export function computeWeeklyBreakdown(offer: JobOffer, combinedRate: number): WeeklyBreakdown {
  const taxableIncome = weeklyTaxableIncome(offer);
  const taxLiability = taxableIncome * combinedRate;
  const stipend = weeklyStipend(offer);
  const amortizedBonus = weeklyAmortizedBonus(offer);
  const nonTaxableIncome = stipend + amortizedBonus;

  return {
    taxableIncome,
    taxLiability,
    stipend,
    amortizedBonus,
    nonTaxableIncome,
    gross: taxableIncome + nonTaxableIncome,
    takeHome: taxableIncome - taxLiability + nonTaxableIncome,
  };
}
