// /src/lib/tax/stateTables.ts
/**
 * State effective income tax rates used for wage income at the filer's tax home.
 *
 * SIMPLIFIED MODEL:
 * - One effective rate per state (no brackets, no filing status).
 * - Rates are applied to taxable wages only; stipends are never taxed.
 * - No local taxes (NYC, Maryland counties, etc.).
 *
 * DATA POLICY:
 * - The bundled table lives in state-effective-rates.json so it can be replaced
 *   yearly without code changes (see STATE_RATES_PATH in engine config).
 * - States in NO_INCOME_TAX_STATES always resolve to 0, whatever a table says.
 */

import { z } from "zod";
import stateRatesJson from "./state-effective-rates.json";

export const STATE_CODES = [
  "AL", "AK", "AZ", "AR", "CA", "CO", "CT", "DE", "DC",
  "FL", "GA", "HI", "ID", "IL", "IN", "IA", "KS", "KY",
  "LA", "ME", "MD", "MA", "MI", "MN", "MS", "MO", "MT",
  "NE", "NV", "NH", "NJ", "NM", "NY", "NC", "ND", "OH",
  "OK", "OR", "PA", "RI", "SC", "SD", "TN", "TX", "UT",
  "VT", "VA", "WA", "WV", "WI", "WY",
] as const;

export type StateCode = (typeof STATE_CODES)[number];

/** Partial on purpose: an injected table may omit states, which then resolve as unknown. */
export type StateRateTable = Partial<Record<StateCode, number>>;

export const NO_INCOME_TAX_STATES: ReadonlySet<StateCode> = new Set<StateCode>([
  "TX",
  "FL",
  "WA",
  "NV",
  "WY",
  "SD",
  "AK",
]);

const STATE_CODE_SET: ReadonlySet<string> = new Set<string>(STATE_CODES);

function isStateCode(value: string): value is StateCode {
  return STATE_CODE_SET.has(value);
}

/**
 * Normalize arbitrary state strings to StateCode where possible.
 * Returns null if not a USPS state code (or DC).
 */
export function asStateCode(state: string): StateCode | null {
  const s = (state || "").trim().toUpperCase();
  return isStateCode(s) ? s : null;
}

export function isNoIncomeTaxState(code: StateCode): boolean {
  return NO_INCOME_TAX_STATES.has(code);
}

export class RateTableParseError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "RateTableParseError";
    this.issues = issues;
  }
}

const StateRateFileSchema = z.object({
  taxYear: z.number().int(),
  rates: z.record(z.string(), z.number().finite().min(0).max(1)),
});

export type StateRateFile = {
  taxYear: number;
  rates: StateRateTable;
};

/**
 * Parse a { taxYear, rates } file body. Keys must be USPS codes; anything else
 * is rejected rather than dropped.
 */
export function parseStateRateFile(raw: unknown): StateRateFile {
  const parsed = StateRateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RateTableParseError(
      "Invalid state rate file.",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const rates: StateRateTable = {};
  const unknown: string[] = [];

  for (const [key, rate] of Object.entries(parsed.data.rates)) {
    const code = asStateCode(key);
    if (!code) {
      unknown.push(key);
      continue;
    }
    rates[code] = rate;
  }

  if (unknown.length) {
    throw new RateTableParseError(
      "State rate file contains unknown state codes.",
      unknown.map((k) => `rates.${k}: not a USPS state code`),
    );
  }

  return { taxYear: parsed.data.taxYear, rates };
}

const BUNDLED = parseStateRateFile(stateRatesJson);

export const STATE_RATES_TAX_YEAR: number = BUNDLED.taxYear;

/** Bundled effective rates (all 50 states + DC). */
export const DEFAULT_STATE_RATES: Readonly<StateRateTable> = Object.freeze(BUNDLED.rates);
