export * from "./types";
export * from "./errors";
export { canonicalIndexName, PRIMARY_KEY_INDEX_NAME } from "./indexes/key-codec";
export { readIndexCatalog, isNamespaceNotFound } from "./indexes/catalog-reader";
export {
  diffIndexes,
  resolveDeclaredIndexes,
  isEmptyPlan,
  summarizePlan,
} from "./indexes/diff-engine";
export { applyIndexPlan } from "./indexes/applier";
export { syncIndexes, planIndexSync } from "./indexes/reconciler";
export { migrate } from "./migrations/executor";
export type { MigrateOptions } from "./migrations/executor";
export {
  intervalMigration,
  applyIntervalMigration,
} from "./migrations/interval-migration";
export {
  defineModel,
  getModelCollection,
  planModelIndexes,
  syncModel,
} from "./models/model";
export { ModelRegistry } from "./models/registry";
export { loadConfig, loadConfigFromEnvironment } from "./config";
export type { ServiceConfig } from "./config";
export { createApp, startServer, handleShutdownSignals } from "./server";
export type { RunningServer } from "./server";
export type { AppContext, BootState } from "./routes/context";
