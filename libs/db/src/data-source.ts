import "reflect-metadata";
import { DataSource, type DataSourceOptions } from "typeorm";
import { ENTITIES } from "./entities";

export type DatabaseConfig =
  | { driver: "postgres"; url: string; synchronize: boolean; logging: boolean }
  | { driver: "sqljs"; location?: string; synchronize: boolean; logging: boolean };

/**
 * Reads the database settings from the environment. `DATABASE_URL` selects
 * postgres; without it the sql.js driver runs, persisted to `DATABASE_FILE`
 * when given and in memory otherwise.
 */
export const databaseConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig => {
  const synchronize = env.DATABASE_SYNC === "true";
  const logging = env.DATABASE_LOGGING === "true";
  const url = env.DATABASE_URL?.trim();

  if (url) {
    const u = new URL(url);
    if (u.protocol !== "postgres:" && u.protocol !== "postgresql:") {
      throw new Error(`Unsupported DATABASE_URL protocol: ${u.protocol}`);
    }
    return { driver: "postgres", url, synchronize, logging };
  }

  const location = env.DATABASE_FILE?.trim() || undefined;
  // nothing to migrate in a fresh in-memory database
  return { driver: "sqljs", location, synchronize: synchronize || !location, logging };
};

export function dataSourceOptions(config: DatabaseConfig): DataSourceOptions {
  if (config.driver === "postgres") {
    return {
      type: "postgres",
      url: config.url,
      entities: ENTITIES,
      synchronize: config.synchronize,
      logging: config.logging,
    };
  }

  return {
    type: "sqljs",
    location: config.location,
    autoSave: config.location !== undefined,
    entities: ENTITIES,
    synchronize: config.synchronize,
    logging: config.logging,
  };
}

/**
 * sqlite has no exact decimal type: a `decimal` column gets numeric affinity
 * and its values come back as doubles. On sql.js those columns are declared
 * as text instead, which the decimal transformer reads back exactly.
 */
class StoreDataSource extends DataSource {
  protected async buildMetadatas(): Promise<void> {
    await super.buildMetadatas();
    if (this.options.type !== "sqljs") return;

    for (const column of this.entityMetadatas.flatMap((m) => m.columns)) {
      if (column.type !== "decimal") continue;
      column.type = "varchar";
      column.precision = undefined;
      column.scale = undefined;
    }
  }
}

export function createDataSource(
  config: DatabaseConfig = databaseConfigFromEnv(),
): DataSource {
  return new StoreDataSource(dataSourceOptions(config));
}
