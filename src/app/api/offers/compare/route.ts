// src/app/api/offers/compare/route.ts

import { NextResponse } from "next/server";
import { z } from "zod";

import { GsaDailyRatesSchema, RateSchema, WeeksWorkedSchema } from "../../../../contracts";
import {
  createEngineFromConfig,
  loadEngineConfig,
  type EngineConfig,
} from "../../../../lib/config/engineConfig";
import { buildComparisonReport, toClientError, type OfferComparisonEngine } from "../../../../lib/offers";
import { FILING_STATUSES_2025 } from "../../../../lib/tax";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/* ------------------------------------------------------------------ */
/* Request schema */
/* ------------------------------------------------------------------ */

// Offers stay unknown here: the engine validates each one and reports rejects.
const CompareRequestSchema = z
  .object({
    offers: z.array(z.unknown()).max(50),
    taxContext: z
      .object({
        taxHomeState: z.string().trim().min(2),
        federalRate: RateSchema.optional(),
        weeksWorked: WeeksWorkedSchema.optional(),
        // Used only when federalRate is omitted.
        annualTaxableWages: z.number().finite().min(0).optional(),
        filingStatus: z.enum(FILING_STATUSES_2025).optional(),
      })
      .strict(),
    gsa: GsaDailyRatesSchema.optional(),
  })
  .strict();

/* ------------------------------------------------------------------ */
/* Engine (configuration is cached, results never are) */
/* ------------------------------------------------------------------ */

type LoadedEngine = { config: EngineConfig; engine: OfferComparisonEngine };

let loaded: Promise<LoadedEngine> | null = null;

function getEngine(): Promise<LoadedEngine> {
  if (!loaded) {
    loaded = loadEngineConfig()
      .then((config) => ({ config, engine: createEngineFromConfig(config) }))
      .catch((err: unknown) => {
        loaded = null;
        throw err;
      });
  }
  return loaded;
}

/**
 * POST /api/offers/compare
 * Ranks offers by annual take-home for the filer's tax home and attaches GSA
 * compliance and stipend tax savings for each ranked offer.
 */
export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json(
      { ok: false, reason: "INVALID_REQUEST", issues: [{ path: "", message: "Body must be JSON." }] },
      { status: 400 },
    );
  }

  const parsed = CompareRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      {
        ok: false,
        reason: "INVALID_REQUEST",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      },
      { status: 400 },
    );
  }

  try {
    const { config, engine } = await getEngine();
    const request = parsed.data;
    const { annualTaxableWages, filingStatus } = request.taxContext;

    const federalRate =
      request.taxContext.federalRate ??
      (annualTaxableWages !== undefined
        ? engine.estimateFederalEffectiveRate(annualTaxableWages, filingStatus)
        : config.defaultFederalRate);

    const report = buildComparisonReport(
      engine,
      request.offers,
      {
        taxHomeState: request.taxContext.taxHomeState,
        federalRate,
        weeksWorked: request.taxContext.weeksWorked ?? config.defaultWeeksWorked,
      },
      request.gsa ?? null,
    );
    const { comparison } = report;

    if (!comparison.ok) {
      console.warn("[OFFERS] comparison rejected", {
        reason: comparison.error.code,
        message: comparison.error.message,
      });
      return NextResponse.json({ ok: false, ...toClientError(comparison.error) }, { status: 422 });
    }

    if (comparison.value.rejected.length) {
      console.warn("[OFFERS] offers skipped", {
        count: comparison.value.rejected.length,
        offerIds: comparison.value.rejected.map((r) => r.offerId ?? null),
      });
    }

    return NextResponse.json(
      {
        ok: true,
        taxContext: comparison.value.taxContext,
        results: comparison.value.results,
        rejected: comparison.value.rejected.map(toClientError),
        bestOfferId: report.bestOffer?.offerId ?? null,
        compliance: comparison.value.results.flatMap((r) => {
          const c = report.compliance.get(r.offerId);
          return c ? [c] : [];
        }),
        // fromEntries defines own properties, so ids like "__proto__" survive
        savings: Object.fromEntries(report.savings),
        noIncomeTaxState: report.noIncomeTaxState,
      },
      { status: 200 },
    );
  } catch (err) {
    console.error("[OFFERS] Unhandled error:", err);
    return NextResponse.json({ ok: false, reason: "COMPARE_FAILED" }, { status: 500 });
  }
}
