// /src/lib/offers/session.ts
// Headless comparison session: offer list + tax settings + GSA rates, with derived results.

import type { GsaDailyRates, JobOffer, OfferComparisonResult, TaxSettings } from "../../contracts";
import type { OfferComparisonEngine } from "./engine";
import { buildComparisonReport, type ComparisonReport } from "./report";

export type ComparisonSnapshot = ComparisonReport &
  Readonly<{
    /** Increments on every recompute. */
    version: number;
    offers: readonly JobOffer[];
    settings: Readonly<TaxSettings>;
    /** null: each offer is checked against its locality (or the engine defaults). */
    gsa: Readonly<GsaDailyRates> | null;
  }>;

export type SnapshotListener = (snapshot: ComparisonSnapshot) => void;

export type ComparisonSession = {
  getSnapshot(): ComparisonSnapshot;
  getResult(offerId: string): OfferComparisonResult | null;

  addOffer(offer: JobOffer): void;
  /** Replaces the offer with the same id. Returns false when no such offer exists. */
  updateOffer(offer: JobOffer): boolean;
  removeOffer(offerId: string): boolean;
  clearOffers(): void;

  updateTaxSettings(patch: Partial<TaxSettings>): void;
  updateGsaRates(rates: GsaDailyRates | null): void;

  subscribe(listener: SnapshotListener): () => void;
};

export type ComparisonSessionInit = {
  settings: TaxSettings;
  offers?: readonly JobOffer[];
  gsa?: GsaDailyRates | null;
};

/**
 * Every mutation rebuilds the whole snapshot from the current inputs. Snapshots
 * are never patched, so a reader holding an old one keeps a consistent view.
 */
export function createComparisonSession(
  engine: OfferComparisonEngine,
  init: ComparisonSessionInit,
): ComparisonSession {
  let offers: JobOffer[] = [...(init.offers ?? [])];
  let settings: TaxSettings = { ...init.settings };
  let gsa: GsaDailyRates | null = init.gsa ? { ...init.gsa } : null;
  let version = 0;
  const listeners = new Set<SnapshotListener>();

  function build(): ComparisonSnapshot {
    version += 1;
    return {
      ...buildComparisonReport(engine, offers, settings, gsa),
      version,
      offers: [...offers],
      settings: { ...settings },
      gsa: gsa ? { ...gsa } : null,
    };
  }

  let snapshot = build();

  function recompute(): void {
    snapshot = build();
    for (const listener of listeners) listener(snapshot);
  }

  return {
    getSnapshot: () => snapshot,
    getResult(offerId) {
      if (!snapshot.comparison.ok) return null;
      return snapshot.comparison.value.results.find((r) => r.offerId === offerId) ?? null;
    },

    addOffer(offer) {
      offers = [...offers, offer];
      recompute();
    },
    updateOffer(offer) {
      const index = offers.findIndex((o) => o.id === offer.id);
      if (index < 0) return false;
      offers = offers.map((o, i) => (i === index ? offer : o));
      recompute();
      return true;
    },
    removeOffer(offerId) {
      const next = offers.filter((o) => o.id !== offerId);
      if (next.length === offers.length) return false;
      offers = next;
      recompute();
      return true;
    },
    clearOffers() {
      offers = [];
      recompute();
    },

    updateTaxSettings(patch) {
      settings = { ...settings, ...patch };
      recompute();
    },
    updateGsaRates(rates) {
      gsa = rates ? { ...rates } : null;
      recompute();
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
