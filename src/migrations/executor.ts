import { CollectionOptions } from "mongodb";
import { DatabaseHandle, ModelCollection } from "../types/database";
import {
  MigrationDeclaration,
  MigrationReport,
} from "../types/migrations";
import { applyIntervalMigration } from "./interval-migration";

export interface MigrateOptions {
  /** Clock used for threshold checks. */
  now?: () => Date;
  collectionOptions?: CollectionOptions;
}

function applyMigration(
  collection: ModelCollection,
  migration: MigrationDeclaration,
  now: Date
): Promise<MigrationReport> {
  switch (migration.kind) {
    case "interval":
      return applyIntervalMigration(collection, migration, now);
    default: {
      const unsupported: never = migration.kind;
      throw new Error(`Unsupported migration kind: ${String(unsupported)}`);
    }
  }
}

/**
 * Run migrations in declaration order, stopping at the first failure. Earlier
 * migrations are not rolled back; each is expected to be idempotent.
 */
export async function migrate(
  db: DatabaseHandle,
  collectionName: string,
  migrations: readonly MigrationDeclaration[],
  options: MigrateOptions = {}
): Promise<MigrationReport[]> {
  const collection = db.collection(collectionName, options.collectionOptions);
  const clock = options.now ?? (() => new Date());

  console.log(`[MIGRATIONS] Starting migrations for '${collection.namespace}'`);

  const reports: MigrationReport[] = [];
  for (const migration of migrations) {
    reports.push(await applyMigration(collection, migration, clock()));
  }

  console.log(`[MIGRATIONS] Finished migrations for '${collection.namespace}'`);
  return reports;
}
