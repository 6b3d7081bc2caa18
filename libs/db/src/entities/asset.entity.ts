import { IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";
import { Column, Entity, PrimaryGeneratedColumn } from "typeorm";
import { TimestampedEntity } from "./timestamped.entity";

@Entity("assets")
export class Asset extends TimestampedEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  @Column({ type: "varchar", length: 100, unique: true })
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  @Column({ type: "varchar", length: 20, nullable: true })
  symbol!: string | null;
}
