import {
  validate,
  type ValidationError as ConstraintError,
} from "class-validator";
import type { DataSource, EntityManager, EntityTarget, ObjectLiteral } from "typeorm";
import type { Decimal } from "../decimal";
import {
  Asset,
  Portfolio,
  PortfolioHolding,
  PortfolioWeight,
  Price,
  Transaction,
} from "../entities";
import { ValidationError, type ConstraintViolation } from "../errors";
import type { IsoDate } from "../iso-date";

export type AssetInput = { name: string; symbol?: string | null };

export type PortfolioInput = {
  name: string;
  initialValue?: Decimal | null;
  initialDate?: IsoDate | null;
};

export type PriceInput = { asset: Asset; date: IsoDate; price: Decimal };

export type WeightInput = {
  portfolio: Portfolio;
  asset: Asset;
  initialWeight: Decimal;
};

export type HoldingInput = {
  portfolio: Portfolio;
  asset: Asset;
  date: IsoDate;
  quantity: Decimal;
};

export type ClearResult = {
  prices: number;
  weights: number;
  holdings: number;
  transactions: number;
  portfolios: number;
  assets: number;
};

function toViolations(errors: ConstraintError[]): ConstraintViolation[] {
  return errors.map((e) => ({
    property: e.property,
    value: e.value,
    constraints: Object.keys(e.constraints ?? {}),
    messages: Object.values(e.constraints ?? {}),
  }));
}

/**
 * Create-or-update by natural key. Every call runs in its own transaction
 * and validates the full record before it is written.
 */
export class UpsertService {
  constructor(private readonly dataSource: DataSource) {}

  upsertAsset(input: AssetInput): Promise<Asset> {
    const name = input.name.trim();

    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Asset);
      const asset =
        (await repo.findOneBy({ name })) ?? repo.create({ name, symbol: null });

      if (input.symbol !== undefined) asset.symbol = input.symbol?.trim() || null;

      return this.cleanAndSave(manager, Asset, asset);
    });
  }

  upsertPortfolio(input: PortfolioInput): Promise<Portfolio> {
    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Portfolio);
      const portfolio =
        (await repo.findOneBy({ name: input.name })) ??
        repo.create({ name: input.name, initialValue: null, initialDate: null });

      if (input.initialValue !== undefined) portfolio.initialValue = input.initialValue;
      if (input.initialDate !== undefined) portfolio.initialDate = input.initialDate;

      return this.cleanAndSave(manager, Portfolio, portfolio);
    });
  }

  upsertPrice(input: PriceInput): Promise<Price> {
    const key = { assetId: input.asset.id, date: input.date };

    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Price);
      const price = (await repo.findOneBy(key)) ?? repo.create(key);
      price.price = input.price;

      return this.cleanAndSave(manager, Price, price);
    });
  }

  upsertWeight(input: WeightInput): Promise<PortfolioWeight> {
    const key = { portfolioId: input.portfolio.id, assetId: input.asset.id };

    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(PortfolioWeight);
      const weight = (await repo.findOneBy(key)) ?? repo.create(key);
      weight.initialWeight = input.initialWeight;

      return this.cleanAndSave(manager, PortfolioWeight, weight);
    });
  }

  upsertHolding(input: HoldingInput): Promise<PortfolioHolding> {
    const key = {
      portfolioId: input.portfolio.id,
      assetId: input.asset.id,
      date: input.date,
    };

    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(PortfolioHolding);
      const holding = (await repo.findOneBy(key)) ?? repo.create(key);
      holding.quantity = input.quantity;

      return this.cleanAndSave(manager, PortfolioHolding, holding);
    });
  }

  /** Deletes everything, children before parents. */
  clearAll(): Promise<ClearResult> {
    return this.dataSource.transaction(async (manager) => ({
      prices: await this.deleteAll(manager, Price),
      weights: await this.deleteAll(manager, PortfolioWeight),
      holdings: await this.deleteAll(manager, PortfolioHolding),
      transactions: await this.deleteAll(manager, Transaction),
      portfolios: await this.deleteAll(manager, Portfolio),
      assets: await this.deleteAll(manager, Asset),
    }));
  }

  private async cleanAndSave<T extends ObjectLiteral>(
    manager: EntityManager,
    target: EntityTarget<T>,
    entity: T,
  ): Promise<T> {
    const errors = await validate(entity);
    if (errors.length) {
      throw new ValidationError(
        manager.getRepository(target).metadata.name,
        toViolations(errors),
      );
    }
    return manager.getRepository(target).save(entity);
  }

  private async deleteAll<T extends ObjectLiteral>(
    manager: EntityManager,
    target: EntityTarget<T>,
  ): Promise<number> {
    const repo = manager.getRepository(target);
    const count = await repo.count();
    await repo.createQueryBuilder().delete().execute();
    return count;
  }
}
