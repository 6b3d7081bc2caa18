import type { Decimal } from "../decimal";
import { silentDiagnostics, type Diagnostics } from "../diagnostics";
import type { Asset, Portfolio, PortfolioHolding } from "../entities";
import {
  PortfolioNotFoundError,
  PortfolioPreconditionError,
  ValidationError,
} from "../errors";
import type { IsoDate } from "../iso-date";
import type { EntityStore } from "../store/entity.store";
import type { UpsertService } from "../store/upsert.service";
import {
  calculateInitialQuantities,
  type SkippedAsset,
} from "./initial-quantities";

export type Derivation = {
  portfolio: Portfolio;
  date: IsoDate;
  holdings: Map<string, PortfolioHolding>;
  skipped: SkippedAsset[];
};

export type DerivationFailure = { portfolio: string; error: Error };

export type BatchDerivation = {
  derived: Derivation[];
  failures: DerivationFailure[];
};

function isPortfolioFault(e: unknown): e is Error {
  return (
    e instanceof PortfolioPreconditionError ||
    e instanceof PortfolioNotFoundError ||
    e instanceof ValidationError
  );
}

/** Writes each portfolio's initial holdings from its weights and t₀ prices. */
export class HoldingsDeriver {
  constructor(
    private readonly store: EntityStore,
    private readonly upserts: UpsertService,
    private readonly diagnostics: Diagnostics = silentDiagnostics,
  ) {}

  async derive(portfolioName: string): Promise<Derivation> {
    const portfolio = await this.store.findPortfolio(portfolioName);
    if (!portfolio) throw new PortfolioNotFoundError(portfolioName);

    const { initialValue, initialDate } = portfolio;
    if (initialValue == null || initialDate == null) {
      const missing: Array<"initialValue" | "initialDate"> = [];
      if (initialValue == null) missing.push("initialValue");
      if (initialDate == null) missing.push("initialDate");
      throw new PortfolioPreconditionError(portfolio.name, missing);
    }

    const holdings = new Map<string, PortfolioHolding>();

    const weights = await this.store.listWeights(portfolio);
    if (!weights.length) {
      this.diagnostics.warn(`${portfolio.name}: no weights on record, nothing to derive`);
      return { portfolio, date: initialDate, holdings, skipped: [] };
    }

    const assets = new Map<string, Asset>();
    for (const w of weights) {
      if (w.asset) assets.set(w.asset.name, w.asset);
    }

    const prices = await this.store.pricesOn(
      [...assets.values()].map((a) => a.id),
      initialDate,
    );
    const pricesByAsset = new Map<string, Decimal>();
    for (const a of assets.values()) {
      const p = prices.get(a.id);
      if (p) pricesByAsset.set(a.name, p.price);
    }

    const calc = calculateInitialQuantities(
      weights.flatMap((w) =>
        w.asset ? [{ assetName: w.asset.name, weight: w.initialWeight }] : [],
      ),
      pricesByAsset,
      initialValue,
    );

    for (const s of calc.skipped) {
      this.diagnostics.warn(`${portfolio.name}: skipping ${s.assetName}, ${s.detail}`);
    }

    for (const q of calc.quantities) {
      const asset = assets.get(q.assetName);
      if (!asset) continue;

      const holding = await this.upserts.upsertHolding({
        portfolio,
        asset,
        date: initialDate,
        quantity: q.quantity,
      });
      holdings.set(q.assetName, holding);
    }

    this.diagnostics.log(
      `${portfolio.name}: derived ${holdings.size} holdings on ${initialDate}`,
    );

    return { portfolio, date: initialDate, holdings, skipped: calc.skipped };
  }

  /** One portfolio failing does not stop the others. */
  async deriveAll(): Promise<BatchDerivation> {
    const derived: Derivation[] = [];
    const failures: DerivationFailure[] = [];

    for (const p of await this.store.listPortfolios()) {
      try {
        derived.push(await this.derive(p.name));
      } catch (e: unknown) {
        if (!isPortfolioFault(e)) throw e;
        this.diagnostics.error(`${p.name}: derivation failed: ${e.message}`, e.stack);
        failures.push({ portfolio: p.name, error: e });
      }
    }

    return { derived, failures };
  }
}
