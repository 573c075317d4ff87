// /src/contracts/offers.ts
/**
 * Offer comparison input contracts.
 *
 * Single source of truth for offer and tax-context shapes. Engine modules, the
 * session and the route all validate against these schemas.
 */

import { z } from "zod";

/** Upper bound on any single pay figure; keeps every derived total finite. */
export const MAX_PAY_AMOUNT = 1_000_000;
/** Hours in a week. */
export const MAX_WEEKLY_HOURS = 168;

const Money = z.number().finite().min(0).max(MAX_PAY_AMOUNT);
const WeeklyHours = z.number().finite().max(MAX_WEEKLY_HOURS);

/** Effective tax rate as a fraction (0.22 = 22%). */
export const RateSchema = z.number().finite().min(0).max(1);

/** Annualization multiplier. */
export const WeeksWorkedSchema = z.number().int().min(1).max(52);

export const JobOfferSchema = z
  .object({
    id: z.string().trim().min(1),
    name: z.string().optional(),
    facilityName: z.string().optional(),
    location: z.string().optional(),

    hourlyRate: Money,
    hoursPerWeek: WeeklyHours.positive(),

    /** Weekly non-taxable stipends. */
    housingStipend: Money,
    mealsStipend: Money,

    overtimeRate: Money.optional(),
    overtimeHours: WeeklyHours.min(0).optional(),

    contractWeeks: z.number().int().positive(),

    completionBonus: Money.optional(),
    signOnBonus: Money.optional(),
    referralBonus: Money.optional(),
  })
  .strict();

export type JobOffer = z.infer<typeof JobOfferSchema>;

export const GsaDailyRatesSchema = z
  .object({
    dailyLodging: Money,
    dailyMeals: Money,
  })
  .strict();

export type GsaDailyRates = z.infer<typeof GsaDailyRatesSchema>;

/**
 * Caller-facing tax settings. The state rate is never supplied here: it is
 * always derived from the tax home.
 */
export const TaxSettingsSchema = z
  .object({
    taxHomeState: z.string().trim().min(2),
    federalRate: RateSchema,
    weeksWorked: WeeksWorkedSchema,
  })
  .strict();

export type TaxSettings = z.infer<typeof TaxSettingsSchema>;
