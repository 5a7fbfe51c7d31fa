// Model declaration types
import { ReadConcernLike, ReadPreferenceLike, WriteConcernSettings } from "mongodb";
import { IndexSpec, PlanSummary } from "./indexes";
import { MigrationDeclaration, MigrationReport } from "./migrations";

export interface ModelDefinitionInput {
  collectionName: string;
  indexes?: IndexSpec[];
  migrations?: MigrationDeclaration[];
  readConcern?: ReadConcernLike;
  writeConcern?: WriteConcernSettings;
  readPreference?: ReadPreferenceLike;
}

export interface ModelDefinition {
  readonly collectionName: string;
  readonly indexes: readonly IndexSpec[];
  readonly migrations: readonly MigrationDeclaration[];
  readonly readConcern?: ReadConcernLike;
  readonly writeConcern?: WriteConcernSettings;
  readonly readPreference?: ReadPreferenceLike;
}

export interface ModelSyncResult {
  collectionName: string;
  plan: PlanSummary;
  migrations: MigrationReport[];
}
