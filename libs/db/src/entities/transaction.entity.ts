import { IsIn, IsInt } from "class-validator";
import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from "typeorm";
import type { Decimal } from "../decimal";
import { decimalTransformer } from "../decimal";
import type { IsoDate } from "../iso-date";
import { HasDecimalDigits, IsPositiveDecimal } from "../validation/decimal.validators";
import { IsIsoDate } from "../validation/is-iso-date";
import { Asset } from "./asset.entity";
import { Portfolio } from "./portfolio.entity";
import { TimestampedEntity } from "./timestamped.entity";

export const TRANSACTION_TYPES = ["BUY", "SELL"] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

// Nothing writes these yet; ingestion only clears them.
@Entity("transactions")
@Index(["portfolioId", "date"])
@Check("transaction_amount_positive", `CAST("amount" AS DECIMAL) > 0`)
@Check("transaction_type_valid", `"type" IN ('BUY', 'SELL')`)
export class Transaction extends TimestampedEntity {
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
  @Column({ type: "date" })
  date!: IsoDate;

  @IsIn(TRANSACTION_TYPES)
  @Column({ type: "varchar", length: 4 })
  type!: TransactionType;

  @IsPositiveDecimal()
  @HasDecimalDigits(15, 2)
  @Column({
    type: "decimal",
    precision: 15,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: Decimal;
}
