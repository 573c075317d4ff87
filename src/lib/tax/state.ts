// /src/lib/tax/state.ts
/**
 * State rate lookup for the filer's tax home.
 *
 * Travel nurses are taxed by their tax-home state, not the assignment state, so
 * callers must pass the tax home here. Unknown states fail instead of falling
 * back to 0: a guessed rate understates liability.
 */

import type { EngineResult, UnknownStateFailure } from "../../contracts";
import {
  DEFAULT_STATE_RATES,
  asStateCode,
  isNoIncomeTaxState,
  type StateCode,
  type StateRateTable,
} from "./stateTables";

export function unknownState(state: string): UnknownStateFailure {
  return {
    code: "UNKNOWN_STATE",
    state,
    message: `No tax rate configured for state "${state}".`,
  };
}

export type StateRateLookup = {
  code: StateCode;
  rate: number;
  noIncomeTax: boolean;
};

export function lookupStateTaxRate(
  state: string,
  table: Readonly<StateRateTable> = DEFAULT_STATE_RATES,
): EngineResult<StateRateLookup, UnknownStateFailure> {
  const code = asStateCode(state);
  if (!code) {
    return { ok: false, error: unknownState(state) };
  }

  if (isNoIncomeTaxState(code)) {
    return { ok: true, value: { code, rate: 0, noIncomeTax: true } };
  }

  const rate = table[code];
  if (rate === undefined) {
    return { ok: false, error: unknownState(code) };
  }

  return { ok: true, value: { code, rate, noIncomeTax: false } };
}

export function getStateTaxRate(
  state: string,
  table: Readonly<StateRateTable> = DEFAULT_STATE_RATES,
): EngineResult<number, UnknownStateFailure> {
  const found = lookupStateTaxRate(state, table);
  return found.ok ? { ok: true, value: found.value.rate } : found;
}
