import { CreateDateColumn, UpdateDateColumn } from "typeorm";

/** Write timestamps, set by the store on insert and on every update. */
export abstract class TimestampedEntity {
  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
