// Index declaration and reconciliation types

/** 1 / -1 for ascending / descending, or a tag such as "text", "2dsphere", "hashed". */
export type IndexKeyToken = number | string;

/**
 * Field path to token. Property insertion order is the key order of the index
 * and is part of its identity. Integer-like field names ("0", "2") are always
 * enumerated first, in ascending numeric order, whatever their declared
 * position; declare such fields first in that order or their position in the
 * canonical name will differ from the declaration.
 */
export type IndexKeys = Record<string, IndexKeyToken>;

/** Opaque creation options (unique, sparse, name, expireAfterSeconds, weights, ...). */
export type IndexOptions = Record<string, unknown>;

export interface IndexSpec {
  keys: IndexKeys;
  options?: IndexOptions;
}

export interface IndexCatalogEntry {
  name: string;
  canonicalName: string;
  keys: IndexKeys;
  options: IndexOptions;
}

/** A declared index after name resolution; `options.name` is always set. */
export interface ResolvedIndexSpec {
  name: string;
  keys: IndexKeys;
  options: IndexOptions;
}

export interface ReconciliationPlan {
  toCreate: Map<string, ResolvedIndexSpec>;
  toDrop: Set<string>;
  unchanged: Set<string>;
}

/** JSON-friendly view of a plan, used in logs and HTTP responses. */
export interface PlanSummary {
  toCreate: ResolvedIndexSpec[];
  toDrop: string[];
  unchanged: string[];
}
