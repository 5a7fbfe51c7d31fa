import isEqual from "lodash/isEqual";
import { ReconcileError } from "../errors";
import {
  IndexCatalogEntry,
  IndexKeys,
  IndexSpec,
  PlanSummary,
  ReconciliationPlan,
  ResolvedIndexSpec,
} from "../types/indexes";
import { BOOKKEEPING_OPTIONS } from "./catalog-reader";
import { canonicalIndexName, isTextIndexKeys } from "./key-codec";

/**
 * Key every declared index by its name, injecting the canonical name into the
 * options of indexes declared without one.
 */
export function resolveDeclaredIndexes(
  declared: readonly IndexSpec[]
): Map<string, ResolvedIndexSpec> {
  const resolved = new Map<string, ResolvedIndexSpec>();

  for (const spec of declared) {
    if (Object.keys(spec.keys).length === 0) {
      throw new ReconcileError(
        "InvalidIndexDeclaration",
        "Index declarations must name at least one key"
      );
    }

    const options = { ...(spec.options ?? {}) };
    const explicitName = options.name;
    if (
      explicitName !== undefined &&
      (typeof explicitName !== "string" || explicitName.length === 0)
    ) {
      throw new ReconcileError(
        "InvalidIndexDeclaration",
        `Index on ${JSON.stringify(spec.keys)} has a non-string or empty 'name' option`
      );
    }

    const name =
      typeof explicitName === "string"
        ? explicitName
        : canonicalIndexName(spec.keys);
    options.name = name;

    if (resolved.has(name)) {
      throw new ReconcileError(
        "DuplicateIndexName",
        `Index name '${name}' is declared more than once`,
        { indexName: name }
      );
    }
    resolved.set(name, { name, keys: { ...spec.keys }, options });
  }

  return resolved;
}

function keysMatch(declared: IndexKeys, current: IndexKeys): boolean {
  // Text indexes come back as { _fts: "text", _ftsx: 1 }; their field set is
  // carried by the weights option instead.
  if (isTextIndexKeys(declared) && isTextIndexKeys(current)) {
    return true;
  }
  return isEqual(Object.entries(declared), Object.entries(current));
}

/**
 * One-directional: every declared option must be present on the server with a
 * deep-equal value. Options only the server reports are ignored.
 */
function optionsMatch(
  declared: ResolvedIndexSpec,
  current: IndexCatalogEntry
): boolean {
  for (const [option, value] of Object.entries(declared.options)) {
    if (BOOKKEEPING_OPTIONS.has(option)) {
      continue;
    }
    if (!(option in current.options)) {
      return false;
    }
    if (!isEqual(value, current.options[option])) {
      return false;
    }
  }
  return true;
}

export function indexMatches(
  declared: ResolvedIndexSpec,
  current: IndexCatalogEntry
): boolean {
  return keysMatch(declared.keys, current.keys) && optionsMatch(declared, current);
}

/**
 * Compute the create/drop plan that takes `current` to `declared`. Indexes
 * cannot be altered in place, so a changed index lands in both `toDrop` and
 * `toCreate` under the same name.
 */
export function diffIndexes(
  declared: readonly IndexSpec[],
  current: ReadonlyMap<string, IndexCatalogEntry>
): ReconciliationPlan {
  const target = resolveDeclaredIndexes(declared);
  const plan: ReconciliationPlan = {
    toCreate: new Map(),
    toDrop: new Set(),
    unchanged: new Set(),
  };

  for (const name of current.keys()) {
    if (!target.has(name)) {
      plan.toDrop.add(name);
    }
  }

  for (const [name, spec] of target) {
    const existing = current.get(name);
    if (!existing) {
      plan.toCreate.set(name, spec);
    } else if (indexMatches(spec, existing)) {
      plan.unchanged.add(name);
    } else {
      plan.toDrop.add(name);
      plan.toCreate.set(name, spec);
    }
  }

  return plan;
}

export function isEmptyPlan(plan: ReconciliationPlan): boolean {
  return plan.toCreate.size === 0 && plan.toDrop.size === 0;
}

export function summarizePlan(plan: ReconciliationPlan): PlanSummary {
  return {
    toCreate: [...plan.toCreate.values()],
    toDrop: [...plan.toDrop],
    unchanged: [...plan.unchanged],
  };
}
