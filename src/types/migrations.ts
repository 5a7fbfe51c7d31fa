// Migration declaration types
import { Document } from "mongodb";

/**
 * Runs at every boot until `threshold` passes, then becomes a permanent no-op.
 * The filter must exclude documents that already carry the migration's effect.
 */
export interface IntervalMigration {
  kind: "interval";
  name: string;
  threshold: Date;
  filter: Document;
  set?: Document;
  unset?: Document;
}

export type MigrationDeclaration = IntervalMigration;

export type MigrationStatus = "expired" | "applied";

export interface MigrationReport {
  name: string;
  status: MigrationStatus;
  matchedCount: number;
  modifiedCount: number;
}
