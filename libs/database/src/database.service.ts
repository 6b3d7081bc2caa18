import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { createDataSource, type DatabaseConfig } from "@folio/db";
import type { DataSource } from "typeorm";

export const DATABASE_CONFIG = Symbol("DATABASE_CONFIG");

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  public readonly dataSource: DataSource;

  constructor(@Inject(DATABASE_CONFIG) config: DatabaseConfig) {
    this.dataSource = createDataSource(config);
  }

  async onModuleInit() {
    await this.dataSource.initialize();
  }

  async onModuleDestroy() {
    if (this.dataSource.isInitialized) await this.dataSource.destroy();
  }
}
