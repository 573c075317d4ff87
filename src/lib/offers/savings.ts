// /src/lib/offers/savings.ts

import type { EngineResult, InvalidInputFailure, JobOffer } from "../../contracts";
import { combinedTaxRate, roundToCents, weeklyStipend } from "./compensation";
import { validateOffer, validateRateInputs } from "./validate";

/**
 * Estimated annual tax avoided by receiving the stipend non-taxable instead of as
 * wages, holding total pay constant: stipend * combined rate * weeks worked.
 *
 * ESTIMATE ONLY (not a filing computation). The combined rate is clamped to 1, so
 * weekly savings never exceed the weekly stipend.
 */
export function calculateStipendTaxSavings(
  offer: JobOffer,
  federalRate: number,
  stateRate: number,
  weeksWorked: number,
): EngineResult<number, InvalidInputFailure> {
  const checked = validateOffer(offer);
  if (!checked.ok) return checked;

  const inputs = validateRateInputs({ federalRate, stateRate, weeksWorked });
  if (!inputs.ok) {
    return { ok: false, error: { ...inputs.error, offerId: checked.value.id } };
  }

  const rate = combinedTaxRate(inputs.value.federalRate, inputs.value.stateRate);
  const savings = weeklyStipend(checked.value) * rate * inputs.value.weeksWorked;

  return { ok: true, value: roundToCents(savings) };
}
