// /src/lib/config/engineConfig.ts
/**
 * Environment-driven configuration for the offer engine.
 *
 * Env vars (all optional):
 * - OFFER_DEFAULT_FEDERAL_RATE   fraction, default 0.22
 * - OFFER_DEFAULT_WEEKS_WORKED   1..52, default 48
 * - GSA_DEFAULT_DAILY_LODGING    default 107
 * - GSA_DEFAULT_DAILY_MEALS      default 79
 * - STATE_RATES_PATH             JSON { taxYear, rates } replacing the bundled table
 * - GSA_LOCALITIES_PATH          JSON { "<city, st>": { dailyLodging, dailyMeals } }
 *
 * Relative paths resolve against process.cwd(). Not compatible with Edge runtime due to fs usage.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { GsaDailyRatesSchema, type GsaDailyRates } from "../../contracts";
import {
  GSA_STANDARD_RATES,
  createOfferComparisonEngine,
  normalizeLocality,
  type GsaLocalityTable,
  type OfferComparisonEngine,
} from "../offers";
import {
  DEFAULT_STATE_RATES,
  RateTableParseError,
  STATE_RATES_TAX_YEAR,
  parseStateRateFile,
  type StateRateTable,
} from "../tax/stateTables";

// A set-but-blank variable counts as unset (coerce would read "" as 0).
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function envNumber(schema: z.ZodNumber, fallback: number) {
  return z.preprocess(blankAsUnset, z.coerce.number().pipe(schema).default(fallback));
}

function envPath() {
  return z.preprocess(blankAsUnset, z.string().trim().min(1).optional());
}

const EnvSchema = z.object({
  OFFER_DEFAULT_FEDERAL_RATE: envNumber(z.number().min(0).max(1), 0.22),
  OFFER_DEFAULT_WEEKS_WORKED: envNumber(z.number().int().min(1).max(52), 48),
  GSA_DEFAULT_DAILY_LODGING: envNumber(z.number().min(0), GSA_STANDARD_RATES.dailyLodging),
  GSA_DEFAULT_DAILY_MEALS: envNumber(z.number().min(0), GSA_STANDARD_RATES.dailyMeals),
  STATE_RATES_PATH: envPath(),
  GSA_LOCALITIES_PATH: envPath(),
});

export type EngineConfig = {
  defaultFederalRate: number;
  defaultWeeksWorked: number;
  gsaDefaults: GsaDailyRates;
  stateRates: Readonly<StateRateTable>;
  stateRatesTaxYear: number;
  gsaLocalities: GsaLocalityTable;
};

export class EngineConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }
}

function toAbsolute(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await readFile(toAbsolute(filePath), "utf8");
  try {
    return JSON.parse(text) as unknown;
  } catch (e) {
    const msg = e instanceof Error ? e.message : "Unknown JSON parse error";
    throw new RateTableParseError(`Failed to parse JSON file ${filePath}.`, [msg]);
  }
}

const GsaLocalityFileSchema = z.record(z.string(), GsaDailyRatesSchema);

export function parseGsaLocalityFile(raw: unknown): GsaLocalityTable {
  const parsed = GsaLocalityFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RateTableParseError(
      "Invalid GSA locality file.",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  return Object.fromEntries(
    Object.entries(parsed.data).map(([location, rates]) => [normalizeLocality(location), rates]),
  );
}

export async function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): Promise<EngineConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new EngineConfigError(
      "Invalid offer engine environment.",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;

  let stateRates: Readonly<StateRateTable> = DEFAULT_STATE_RATES;
  let stateRatesTaxYear = STATE_RATES_TAX_YEAR;
  if (e.STATE_RATES_PATH) {
    const file = parseStateRateFile(await readJsonFile(e.STATE_RATES_PATH));
    stateRates = file.rates;
    stateRatesTaxYear = file.taxYear;
    console.log("[CONFIG] state rate table loaded", {
      path: e.STATE_RATES_PATH,
      taxYear: file.taxYear,
      states: Object.keys(file.rates).length,
    });
  }

  let gsaLocalities: GsaLocalityTable = {};
  if (e.GSA_LOCALITIES_PATH) {
    gsaLocalities = parseGsaLocalityFile(await readJsonFile(e.GSA_LOCALITIES_PATH));
    console.log("[CONFIG] GSA localities loaded", {
      path: e.GSA_LOCALITIES_PATH,
      localities: Object.keys(gsaLocalities).length,
    });
  }

  return {
    defaultFederalRate: e.OFFER_DEFAULT_FEDERAL_RATE,
    defaultWeeksWorked: e.OFFER_DEFAULT_WEEKS_WORKED,
    gsaDefaults: {
      dailyLodging: e.GSA_DEFAULT_DAILY_LODGING,
      dailyMeals: e.GSA_DEFAULT_DAILY_MEALS,
    },
    stateRates,
    stateRatesTaxYear,
    gsaLocalities,
  };
}

export function createEngineFromConfig(config: EngineConfig): OfferComparisonEngine {
  return createOfferComparisonEngine({
    stateRates: config.stateRates,
    gsaDefaults: config.gsaDefaults,
    gsaLocalities: config.gsaLocalities,
  });
}
