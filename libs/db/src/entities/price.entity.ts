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
import { HasDecimalDigits, IsPositiveDecimal } from "../validation/decimal.validators";
import { IsIsoDate } from "../validation/is-iso-date";
import { Asset } from "./asset.entity";
import { TimestampedEntity } from "./timestamped.entity";

/** Daily close p(i,t) of one asset. */
@Entity("prices")
@Unique("unique_asset_date_price", ["assetId", "date"])
@Check("price_positive", `CAST("price" AS DECIMAL) > 0`)
export class Price extends TimestampedEntity {
  @PrimaryGeneratedColumn()
  id!: number;

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

  @IsPositiveDecimal()
  @HasDecimalDigits(20, 8)
  @Column({
    type: "decimal",
    precision: 20,
    scale: 8,
    transformer: decimalTransformer,
  })
  price!: Decimal;
}
