import {
  Between,
  In,
  LessThanOrEqual,
  MoreThanOrEqual,
  type DataSource,
  type FindOptionsWhere,
} from "typeorm";
import {
  Asset,
  Portfolio,
  PortfolioHolding,
  PortfolioWeight,
  Price,
  Transaction,
} from "../entities";
import type { IsoDate } from "../iso-date";

export type StoreCounts = {
  assets: number;
  portfolios: number;
  prices: number;
  weights: number;
  holdings: number;
  transactions: number;
};

export type DateRange = { from?: IsoDate; to?: IsoDate };

/** Reads, each by natural key or by owner. */
export class EntityStore {
  constructor(private readonly dataSource: DataSource) {}

  findAsset(name: string) {
    return this.dataSource.getRepository(Asset).findOneBy({ name: name.trim() });
  }

  findPortfolio(name: string) {
    return this.dataSource.getRepository(Portfolio).findOneBy({ name });
  }

  findPrice(asset: Asset, date: IsoDate) {
    return this.dataSource
      .getRepository(Price)
      .findOneBy({ assetId: asset.id, date });
  }

  findWeight(portfolio: Portfolio, asset: Asset) {
    return this.dataSource
      .getRepository(PortfolioWeight)
      .findOneBy({ portfolioId: portfolio.id, assetId: asset.id });
  }

  findHolding(portfolio: Portfolio, asset: Asset, date: IsoDate) {
    return this.dataSource
      .getRepository(PortfolioHolding)
      .findOneBy({ portfolioId: portfolio.id, assetId: asset.id, date });
  }

  listAssets() {
    return this.dataSource.getRepository(Asset).find({ order: { name: "ASC" } });
  }

  listPortfolios() {
    return this.dataSource
      .getRepository(Portfolio)
      .find({ order: { name: "ASC" } });
  }

  listWeights(portfolio: Portfolio) {
    return this.dataSource.getRepository(PortfolioWeight).find({
      where: { portfolioId: portfolio.id },
      relations: { asset: true },
      order: { asset: { name: "ASC" } },
    });
  }

  listHoldings(portfolio: Portfolio, date?: IsoDate) {
    const where: FindOptionsWhere<PortfolioHolding> = { portfolioId: portfolio.id };
    if (date) where.date = date;

    return this.dataSource.getRepository(PortfolioHolding).find({
      where,
      relations: { asset: true },
      order: { date: "DESC", asset: { name: "ASC" } },
    });
  }

  listPrices(asset: Asset, range: DateRange = {}) {
    const where: FindOptionsWhere<Price> = { assetId: asset.id };
    if (range.from && range.to) where.date = Between(range.from, range.to);
    else if (range.from) where.date = MoreThanOrEqual(range.from);
    else if (range.to) where.date = LessThanOrEqual(range.to);

    return this.dataSource.getRepository(Price).find({
      where,
      order: { date: "DESC" },
    });
  }

  /** Prices of the given assets on one date, keyed by asset id. */
  async pricesOn(assetIds: number[], date: IsoDate): Promise<Map<number, Price>> {
    if (!assetIds.length) return new Map();

    const rows = await this.dataSource
      .getRepository(Price)
      .findBy({ assetId: In(assetIds), date });

    return new Map(rows.map((p) => [p.assetId, p]));
  }

  async counts(): Promise<StoreCounts> {
    const m = this.dataSource.manager;
    const [assets, portfolios, prices, weights, holdings, transactions] =
      await Promise.all([
        m.count(Asset),
        m.count(Portfolio),
        m.count(Price),
        m.count(PortfolioWeight),
        m.count(PortfolioHolding),
        m.count(Transaction),
      ]);

    return { assets, portfolios, prices, weights, holdings, transactions };
  }
}
