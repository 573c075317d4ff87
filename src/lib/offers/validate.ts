// /src/lib/offers/validate.ts

import { z } from "zod";
import {
  GsaDailyRatesSchema,
  JobOfferSchema,
  RateSchema,
  WeeksWorkedSchema,
  type EngineResult,
  type GsaDailyRates,
  type InvalidInputFailure,
  type JobOffer,
} from "../../contracts";
import { invalidInput, issuesFromZod } from "./errors";

/**
 * Narrowing helpers (no `any`).
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Best-effort id for reporting a rejected offer. */
export function readOfferId(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  const id = raw.id;
  return typeof id === "string" && id.trim().length > 0 ? id.trim() : undefined;
}

export function validateOffer(raw: unknown): EngineResult<JobOffer, InvalidInputFailure> {
  const parsed = JobOfferSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: invalidInput("Offer failed validation.", issuesFromZod(parsed.error), readOfferId(raw)),
    };
  }
  return { ok: true, value: parsed.data };
}

const RateInputsSchema = z.object({
  federalRate: RateSchema,
  stateRate: RateSchema,
  weeksWorked: WeeksWorkedSchema,
});

export type RateInputs = z.infer<typeof RateInputsSchema>;

export function validateRateInputs(input: RateInputs): EngineResult<RateInputs, InvalidInputFailure> {
  const parsed = RateInputsSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: invalidInput("Tax rates or weeks worked are invalid.", issuesFromZod(parsed.error)),
    };
  }
  return { ok: true, value: parsed.data };
}

export function validateGsaRates(rates: GsaDailyRates): EngineResult<GsaDailyRates, InvalidInputFailure> {
  const parsed = GsaDailyRatesSchema.safeParse(rates);
  if (!parsed.success) {
    return {
      ok: false,
      error: invalidInput("GSA per-diem rates are invalid.", issuesFromZod(parsed.error)),
    };
  }
  return { ok: true, value: parsed.data };
}
