// /src/lib/tax/state.test.ts
import { describe, it, expect } from "vitest";

import { getStateTaxRate, lookupStateTaxRate } from "./state";
import {
  DEFAULT_STATE_RATES,
  NO_INCOME_TAX_STATES,
  RateTableParseError,
  STATE_CODES,
  STATE_RATES_TAX_YEAR,
  asStateCode,
  parseStateRateFile,
} from "./stateTables";

describe("state rate lookup", () => {
  it("returns exactly 0 for every no-income-tax state", () => {
    for (const code of ["TX", "FL", "WA", "NV", "WY", "SD", "AK"]) {
      expect(getStateTaxRate(code)).toEqual({ ok: true, value: 0 });
    }
    expect(NO_INCOME_TAX_STATES.size).toBe(7);
  });

  it("keeps no-income-tax states at 0 even when a table says otherwise", () => {
    const table = { TX: 0.05, FL: 0.03 };

    expect(getStateTaxRate("TX", table)).toEqual({ ok: true, value: 0 });
    expect(getStateTaxRate("FL", table)).toEqual({ ok: true, value: 0 });
  });

  it("reads bundled rates and normalizes case and whitespace", () => {
    expect(getStateTaxRate("CA")).toEqual({ ok: true, value: 0.093 });
    expect(getStateTaxRate(" ny ")).toEqual({ ok: true, value: 0.0685 });
  });

  it("reports the resolved code and whether the state is tax free", () => {
    expect(lookupStateTaxRate("or")).toEqual({
      ok: true,
      value: { code: "OR", rate: 0.09, noIncomeTax: false },
    });
    expect(lookupStateTaxRate("wy")).toEqual({
      ok: true,
      value: { code: "WY", rate: 0, noIncomeTax: true },
    });
  });

  it("fails with UNKNOWN_STATE for strings that are not state codes", () => {
    const result = getStateTaxRate("ZZ");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("UNKNOWN_STATE");
      expect(result.error.state).toBe("ZZ");
    }

    expect(getStateTaxRate("Texas").ok).toBe(false);
    expect(getStateTaxRate("").ok).toBe(false);
  });

  it("fails instead of defaulting when an injected table omits the state", () => {
    const result = getStateTaxRate("ca", { NY: 0.06 });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "UNKNOWN_STATE",
        state: "CA",
        message: 'No tax rate configured for state "CA".',
      },
    });
  });
});

describe("state tables", () => {
  it("bundles a rate for all 50 states plus DC", () => {
    expect(STATE_CODES).toHaveLength(51);
    expect(Object.keys(DEFAULT_STATE_RATES)).toHaveLength(51);
    expect(STATE_RATES_TAX_YEAR).toBe(2024);
  });

  it("normalizes state codes", () => {
    expect(asStateCode(" dc ")).toBe("DC");
    expect(asStateCode("PR")).toBeNull();
  });

  it("rejects rate files with unknown codes", () => {
    expect(() => parseStateRateFile({ taxYear: 2025, rates: { CA: 0.1, XX: 0.02 } })).toThrow(
      RateTableParseError,
    );

    try {
      parseStateRateFile({ taxYear: 2025, rates: { XX: 0.02 } });
    } catch (e) {
      expect(e).toBeInstanceOf(RateTableParseError);
      if (e instanceof RateTableParseError) {
        expect(e.issues).toEqual(["rates.XX: not a USPS state code"]);
      }
    }
  });

  it("rejects rates outside [0, 1]", () => {
    expect(() => parseStateRateFile({ taxYear: 2025, rates: { CA: 1.5 } })).toThrow(
      "Invalid state rate file.",
    );
  });

  it("accepts lowercase keys and partial tables", () => {
    expect(parseStateRateFile({ taxYear: 2025, rates: { ca: 0.1 } })).toEqual({
      taxYear: 2025,
      rates: { CA: 0.1 },
    });
  });
});
