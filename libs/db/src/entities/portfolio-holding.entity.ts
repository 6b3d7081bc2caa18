import { IsInt } from "class-validator";
import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from "typeorm";
import type { Decimal } from "../decimal";
import { decimalTransformer } from "../decimal";
import type { IsoDate } from "../iso-date";
import { HasDecimalDigits, IsNonNegativeDecimal } from "../validation/decimal.validators";
import { IsIsoDate } from "../validation/is-iso-date";
import { Asset } from "./asset.entity";
import { Portfolio } from "./portfolio.entity";
import { TimestampedEntity } from "./timestamped.entity";

/** Quantity c(i,t) of an asset held by a portfolio on a date. */
@Entity("portfolio_holdings")
@Unique("unique_portfolio_asset_date_holding", ["portfolioId", "assetId", "date"])
@Check("quantity_non_negative", `CAST("quantity" AS DECIMAL) >= 0`)
export class PortfolioHolding extends TimestampedEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @IsInt()
  @Column({ type: "int" })
  portfolioId!: number;

  @ManyToOne(() => Portfolio, { onDelete: "CASCADE" })
  @JoinColumn({ name: "portfolioId" })
  portfolio?: Portfolio;

  @IsInt()
  @Column({ type: "int" })
  assetId!: number;

  @ManyToOne(() => Asset, { onDelete: "CASCADE" })
  @JoinColumn({ name: "assetId" })
  asset?: Asset;

  @IsIsoDate()
  @Index()
  @Column({ type: "date" })
  date!: IsoDate;

  @IsNonNegativeDecimal()
  @HasDecimalDigits(28, 8)
  @Column({
    type: "decimal",
    precision: 28,
    scale: 8,
    transformer: decimalTransformer,
  })
  quantity!: Decimal;
}
