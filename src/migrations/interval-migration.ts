import { Document, UpdateFilter, UpdateOptions, UpdateResult } from "mongodb";
import { MigrationError, describeError } from "../errors";
import { ModelCollection } from "../types/database";
import { IntervalMigration, MigrationReport } from "../types/migrations";

// Migration updates never upsert and wait for majority, journaled acknowledgment.
export const MIGRATION_UPDATE_OPTIONS: UpdateOptions = {
  upsert: false,
  writeConcern: { w: "majority", journal: true },
};

export function intervalMigration(
  declaration: Omit<IntervalMigration, "kind">
): IntervalMigration {
  return { kind: "interval", ...declaration };
}

export function isExpired(migration: IntervalMigration, now: Date): boolean {
  return now.getTime() > migration.threshold.getTime();
}

/** `{ $set, $unset }` with only the operators the migration declares. */
export function buildMigrationUpdate(
  migration: IntervalMigration
): UpdateFilter<Document> {
  if (!migration.set && !migration.unset) {
    throw new MigrationError(
      "MigrationDeclarationInvalid",
      migration.name,
      `Migration '${migration.name}': one of '$set' or '$unset' must be specified`
    );
  }

  const update: UpdateFilter<Document> = {};
  if (migration.set) {
    update.$set = migration.set;
  }
  if (migration.unset) {
    update.$unset = migration.unset;
  }
  return update;
}

export async function applyIntervalMigration(
  collection: ModelCollection,
  migration: IntervalMigration,
  now: Date
): Promise<MigrationReport> {
  const namespace = collection.namespace;
  console.log(
    `[MIGRATIONS] Executing migration '${migration.name}' against '${namespace}'`
  );

  if (Number.isNaN(migration.threshold.getTime())) {
    throw new MigrationError(
      "MigrationDeclarationInvalid",
      migration.name,
      `Migration '${migration.name}': threshold is not a valid date`
    );
  }

  if (isExpired(migration, now)) {
    console.log(
      `[MIGRATIONS] Migration '${migration.name}' passed its threshold (${migration.threshold.toISOString()}). No-op.`
    );
    return { name: migration.name, status: "expired", matchedCount: 0, modifiedCount: 0 };
  }

  const update = buildMigrationUpdate(migration);

  let result: UpdateResult;
  try {
    result = await collection.updateMany(
      migration.filter,
      update,
      MIGRATION_UPDATE_OPTIONS
    );
  } catch (error) {
    console.error(
      `[MIGRATIONS] ❌ Migration '${migration.name}' failed against '${namespace}':`,
      error
    );
    throw new MigrationError(
      "MigrationWriteFailed",
      migration.name,
      `Migration '${migration.name}' failed against '${namespace}': ${describeError(error)}`,
      { cause: error }
    );
  }

  if (!result.acknowledged) {
    throw new MigrationError(
      "MigrationWriteFailed",
      migration.name,
      `Migration '${migration.name}' against '${namespace}' was not acknowledged`
    );
  }

  console.log(
    `[MIGRATIONS] ✅ Migration '${migration.name}' against '${namespace}': ${result.matchedCount} matched, ${result.modifiedCount} modified`
  );
  return {
    name: migration.name,
    status: "applied",
    matchedCount: result.matchedCount,
    modifiedCount: result.modifiedCount,
  };
}
