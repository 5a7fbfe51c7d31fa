import { Document } from "mongodb";
import { ReconcileError, describeError } from "../errors";
import { DatabaseHandle } from "../types/database";
import { ReconciliationPlan, ResolvedIndexSpec } from "../types/indexes";

export function toIndexDocument(spec: ResolvedIndexSpec): Document {
  return { key: spec.keys, ...spec.options, name: spec.name };
}

/**
 * Drop first, then create everything in one createIndexes command. Dropping
 * first frees the name of an index being replaced. The first failure aborts
 * the pass; a later sync picks up whatever was left undone.
 */
export async function applyIndexPlan(
  db: DatabaseHandle,
  collectionName: string,
  plan: ReconciliationPlan
): Promise<void> {
  const namespace = `${db.databaseName}.${collectionName}`;

  for (const name of plan.toDrop) {
    console.log(`[INDEXES] Dropping index '${name}' on '${namespace}'`);
    try {
      await db.command({ dropIndexes: collectionName, index: name });
    } catch (error) {
      throw new ReconcileError(
        "IndexOperationFailed",
        `Failed to drop index '${name}' on '${namespace}': ${describeError(error)}`,
        { namespace, indexName: name, cause: error }
      );
    }
  }

  if (plan.toCreate.size === 0) {
    return;
  }

  const names = [...plan.toCreate.keys()];
  console.log(
    `[INDEXES] Creating ${names.length} index(es) on '${namespace}': ${names.join(", ")}`
  );
  try {
    await db.command({
      createIndexes: collectionName,
      indexes: [...plan.toCreate.values()].map(toIndexDocument),
    });
  } catch (error) {
    throw new ReconcileError(
      "IndexOperationFailed",
      `Failed to create index(es) ${names.map((n) => `'${n}'`).join(", ")} on '${namespace}': ${describeError(error)}`,
      { namespace, indexName: names.join(", "), cause: error }
    );
  }
}
