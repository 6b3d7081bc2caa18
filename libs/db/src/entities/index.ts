import { Asset } from "./asset.entity";
import { Portfolio } from "./portfolio.entity";
import { PortfolioHolding } from "./portfolio-holding.entity";
import { PortfolioWeight } from "./portfolio-weight.entity";
import { Price } from "./price.entity";
import { Transaction } from "./transaction.entity";

export { Asset, Portfolio, PortfolioHolding, PortfolioWeight, Price, Transaction };
export { TRANSACTION_TYPES, type TransactionType } from "./transaction.entity";

export const ENTITIES = [
  Asset,
  Portfolio,
  Price,
  PortfolioWeight,
  PortfolioHolding,
  Transaction,
];
