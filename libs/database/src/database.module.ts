import { Global, Logger, Module } from "@nestjs/common";
import {
  EntityStore,
  HoldingsDeriver,
  UpsertService,
  databaseConfigFromEnv,
} from "@folio/db";
import { DATABASE_CONFIG, DatabaseService } from "./database.service";

/** Shared by the loader and the API: one DataSource per application. */
@Global()
@Module({
  providers: [
    { provide: DATABASE_CONFIG, useFactory: () => databaseConfigFromEnv() },
    DatabaseService,
    {
      provide: EntityStore,
      useFactory: (db: DatabaseService) => new EntityStore(db.dataSource),
      inject: [DatabaseService],
    },
    {
      provide: UpsertService,
      useFactory: (db: DatabaseService) => new UpsertService(db.dataSource),
      inject: [DatabaseService],
    },
    {
      provide: HoldingsDeriver,
      useFactory: (store: EntityStore, upserts: UpsertService) =>
        new HoldingsDeriver(store, upserts, new Logger(HoldingsDeriver.name)),
      inject: [EntityStore, UpsertService],
    },
  ],
  exports: [DatabaseService, EntityStore, UpsertService, HoldingsDeriver],
})
export class DatabaseModule {}
