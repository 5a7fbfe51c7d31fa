import { CollectionOptions } from "mongodb";
import { isValidCollectionName } from "../database/validation";
import { ModelDefinitionError } from "../errors";
import { syncIndexes, planIndexSync } from "../indexes/reconciler";
import { summarizePlan } from "../indexes/diff-engine";
import { migrate } from "../migrations/executor";
import { DatabaseHandle, ModelCollection } from "../types/database";
import { PlanSummary } from "../types/indexes";
import {
  ModelDefinition,
  ModelDefinitionInput,
  ModelSyncResult,
} from "../types/models";

export function defineModel(input: ModelDefinitionInput): ModelDefinition {
  if (!isValidCollectionName(input.collectionName)) {
    throw new ModelDefinitionError(
      `Invalid collection name '${input.collectionName}'`
    );
  }

  const migrationNames = new Set<string>();
  for (const migration of input.migrations ?? []) {
    if (migrationNames.has(migration.name)) {
      throw new ModelDefinitionError(
        `Migration name '${migration.name}' is used more than once on '${input.collectionName}'`
      );
    }
    migrationNames.add(migration.name);
  }

  return Object.freeze({
    ...input,
    indexes: Object.freeze([...(input.indexes ?? [])]),
    migrations: Object.freeze([...(input.migrations ?? [])]),
  });
}

export function modelCollectionOptions(model: ModelDefinition): CollectionOptions {
  return {
    readConcern: model.readConcern,
    writeConcern: model.writeConcern,
    readPreference: model.readPreference,
  };
}

/** Collection handle carrying the model's read/write concern and read preference. */
export function getModelCollection(
  db: DatabaseHandle,
  model: ModelDefinition
): ModelCollection {
  return db.collection(model.collectionName, modelCollectionOptions(model));
}

export async function planModelIndexes(
  db: DatabaseHandle,
  model: ModelDefinition
): Promise<PlanSummary> {
  const plan = await planIndexSync(db, model.collectionName, model.indexes);
  return summarizePlan(plan);
}

/**
 * Synchronize a model with the backend: indexes first, so migration filters
 * are covered, then migrations. Call once per model at boot, before serving.
 */
export async function syncModel(
  db: DatabaseHandle,
  model: ModelDefinition,
  options: { now?: () => Date } = {}
): Promise<ModelSyncResult> {
  const plan = await syncIndexes(db, model.collectionName, model.indexes);
  const migrations = await migrate(db, model.collectionName, model.migrations, {
    now: options.now,
    collectionOptions: modelCollectionOptions(model),
  });

  return {
    collectionName: model.collectionName,
    plan: summarizePlan(plan),
    migrations,
  };
}
