import { Injectable, NotFoundException } from '@nestjs/common';
import { EntityStore, HoldingsDeriver, type PortfolioHolding } from '@folio/db';
import type {
  DerivationView,
  HoldingView,
  PortfolioView,
  WeightView,
} from './portfolio.types';

const holdingView = (h: PortfolioHolding, assetName?: string): HoldingView => ({
  asset: assetName ?? h.asset?.name ?? String(h.assetId),
  date: h.date,
  quantity: h.quantity.toString(),
});

@Injectable()
export class PortfoliosService {
  constructor(
    private readonly store: EntityStore,
    private readonly deriver: HoldingsDeriver,
  ) {}

  async list(): Promise<PortfolioView[]> {
    const portfolios = await this.store.listPortfolios();
    return portfolios.map((p) => ({
      id: p.id,
      name: p.name,
      initialValue: p.initialValue?.toFixed(2) ?? null,
      initialDate: p.initialDate,
    }));
  }

  async weights(name: string): Promise<WeightView[]> {
    const portfolio = await this.get(name);
    const weights = await this.store.listWeights(portfolio);
    return weights.map((w) => ({
      asset: w.asset?.name ?? String(w.assetId),
      initialWeight: w.initialWeight.toString(),
    }));
  }

  async holdings(name: string, date?: string): Promise<HoldingView[]> {
    const portfolio = await this.get(name);
    const holdings = await this.store.listHoldings(portfolio, date);
    return holdings.map((h) => holdingView(h));
  }

  async derive(name: string): Promise<DerivationView> {
    const res = await this.deriver.derive(name);
    return {
      portfolio: res.portfolio.name,
      date: res.date,
      holdings: [...res.holdings].map(([asset, h]) => holdingView(h, asset)),
      skipped: res.skipped.map((s) => ({
        asset: s.assetName,
        reason: s.reason,
        detail: s.detail,
      })),
    };
  }

  private async get(name: string) {
    const portfolio = await this.store.findPortfolio(name);
    if (!portfolio) throw new NotFoundException('Portfolio not found');
    return portfolio;
  }
}
