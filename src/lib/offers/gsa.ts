// /src/lib/offers/gsa.ts
/**
 * GSA per-diem safe-harbor check.
 *
 * Weekly ceiling = (daily lodging + daily meals) * 7. Stipend above the ceiling is
 * reported as excess (the portion that may lose non-taxable status).
 *
 * A zero ceiling (missing locality data) flags any nonzero stipend for review.
 */

import type {
  EngineResult,
  GSAComplianceResult,
  GsaDailyRates,
  InvalidInputFailure,
  JobOffer,
} from "../../contracts";
import { roundToCents } from "./compensation";
import { validateGsaRates, validateOffer } from "./validate";

/** FY2024 GSA standard CONUS rates. */
export const GSA_STANDARD_RATES: GsaDailyRates = Object.freeze({
  dailyLodging: 107,
  dailyMeals: 79,
});

/** Locality key (e.g. "san diego, ca") -> daily rates. */
export type GsaLocalityTable = Readonly<Record<string, GsaDailyRates>>;

export function normalizeLocality(location: string): string {
  return location.trim().toLowerCase().replace(/\s+/g, " ");
}

export function resolveGsaRates(
  location: string | undefined,
  localities: GsaLocalityTable,
  defaults: GsaDailyRates = GSA_STANDARD_RATES,
): GsaDailyRates {
  if (!location) return defaults;
  const key = normalizeLocality(location);
  if (!key) return defaults;
  const hit = Object.hasOwn(localities, key) ? localities[key] : undefined;
  return hit ?? defaults;
}

function excessOver(amount: number, cap: number): number {
  return amount > cap ? roundToCents(amount - cap) : 0;
}

export function checkGSACompliance(
  offer: JobOffer,
  gsaDailyLodging: number,
  gsaDailyMeals: number,
): EngineResult<GSAComplianceResult, InvalidInputFailure> {
  const checked = validateOffer(offer);
  if (!checked.ok) return checked;

  const rates = validateGsaRates({ dailyLodging: gsaDailyLodging, dailyMeals: gsaDailyMeals });
  if (!rates.ok) {
    return { ok: false, error: { ...rates.error, offerId: checked.value.id } };
  }

  const { housingStipend, mealsStipend, id } = checked.value;
  const { dailyLodging, dailyMeals } = rates.value;

  const weeklyStipend = roundToCents(housingStipend + mealsStipend);
  const weeklyCeiling = roundToCents((dailyLodging + dailyMeals) * 7);
  const housingCap = roundToCents(dailyLodging * 7);
  const mealsCap = roundToCents(dailyMeals * 7);

  return {
    ok: true,
    value: {
      offerId: id,
      gsaDailyLodging: dailyLodging,
      gsaDailyMeals: dailyMeals,

      weeklyStipend,
      weeklyCeiling,
      isCompliant: weeklyStipend <= weeklyCeiling,
      excessAmount: excessOver(weeklyStipend, weeklyCeiling),

      housingWithinLimit: housingStipend <= housingCap,
      mealsWithinLimit: mealsStipend <= mealsCap,
      housingExcess: excessOver(housingStipend, housingCap),
      mealsExcess: excessOver(mealsStipend, mealsCap),
    },
  };
}
