import { IsInt } from "class-validator";
import {
  Check,
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from "typeorm";
import type { Decimal } from "../decimal";
import { decimalTransformer } from "../decimal";
import { HasDecimalDigits, IsDecimalBetween } from "../validation/decimal.validators";
import { Asset } from "./asset.entity";
import { Portfolio } from "./portfolio.entity";
import { TimestampedEntity } from "./timestamped.entity";

/** Initial weight w(i,0) as a fraction, 0.15 for 15%. */
@Entity("portfolio_weights")
@Unique("unique_portfolio_asset_weight", ["portfolioId", "assetId"])
@Check("weight_range_0_to_1", `CAST("initialWeight" AS DECIMAL) BETWEEN 0 AND 1`)
export class PortfolioWeight extends TimestampedEntity {
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

  @IsDecimalBetween(0, 1)
  @HasDecimalDigits(10, 8)
  @Column({
    type: "decimal",
    precision: 10,
    scale: 8,
    transformer: decimalTransformer,
  })
  initialWeight!: Decimal;
}
