import { IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";
import { Column, Entity, PrimaryGeneratedColumn } from "typeorm";
import type { Decimal } from "../decimal";
import { decimalTransformer } from "../decimal";
import type { IsoDate } from "../iso-date";
import { HasDecimalDigits, IsPositiveDecimal } from "../validation/decimal.validators";
import { IsIsoDate } from "../validation/is-iso-date";
import { TimestampedEntity } from "./timestamped.entity";

/**
 * A portfolio with its initial value V₀ and initial date t₀. Both may be
 * absent on record, but derivation refuses to run without them.
 */
@Entity("portfolios")
export class Portfolio extends TimestampedEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  @Column({ type: "varchar", length: 100, unique: true })
  name!: string;

  @IsOptional()
  @IsPositiveDecimal()
  @HasDecimalDigits(15, 2)
  @Column({
    type: "decimal",
    precision: 15,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  initialValue!: Decimal | null;

  @IsOptional()
  @IsIsoDate()
  @Column({ type: "date", nullable: true })
  initialDate!: IsoDate | null;
}
