import { DatabaseHandle } from "../types/database";
import { IndexSpec, ReconciliationPlan } from "../types/indexes";
import { applyIndexPlan } from "./applier";
import { readIndexCatalog } from "./catalog-reader";
import { diffIndexes, isEmptyPlan } from "./diff-engine";

/** Read the live catalog and diff it against the declared indexes. Applies nothing. */
export async function planIndexSync(
  db: DatabaseHandle,
  collectionName: string,
  declared: readonly IndexSpec[]
): Promise<ReconciliationPlan> {
  const current = await readIndexCatalog(db, collectionName);
  return diffIndexes(declared, current);
}

/**
 * Bring the collection's indexes in line with `declared`: indexes that are not
 * declared are dropped, missing ones created, changed ones replaced.
 * No retries; callers that want them wrap this call.
 */
export async function syncIndexes(
  db: DatabaseHandle,
  collectionName: string,
  declared: readonly IndexSpec[]
): Promise<ReconciliationPlan> {
  const namespace = `${db.databaseName}.${collectionName}`;
  console.log(`[INDEXES] Synchronizing indexes for '${namespace}'`);

  const plan = await planIndexSync(db, collectionName, declared);
  if (isEmptyPlan(plan)) {
    console.log(
      `[INDEXES] ✅ '${namespace}' is up to date (${plan.unchanged.size} unchanged)`
    );
    return plan;
  }

  console.log(
    `[INDEXES] Plan for '${namespace}': ${plan.toCreate.size} to create, ${plan.toDrop.size} to drop, ${plan.unchanged.size} unchanged`
  );
  await applyIndexPlan(db, collectionName, plan);

  console.log(`[INDEXES] ✅ Finished synchronizing indexes for '${namespace}'`);
  return plan;
}
