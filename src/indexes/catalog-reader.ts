import { Document, MongoServerError } from "mongodb";
import { ReconcileError, describeError } from "../errors";
import { DatabaseHandle } from "../types/database";
import {
  IndexCatalogEntry,
  IndexKeys,
  IndexOptions,
} from "../types/indexes";
import { PRIMARY_KEY_INDEX_NAME, canonicalIndexName } from "./key-codec";

const NAMESPACE_NOT_FOUND_CODE = 26;

/**
 * Options the server reports for its own bookkeeping, or accepts at creation
 * time without echoing back. They never take part in comparisons.
 */
export const BOOKKEEPING_OPTIONS: ReadonlySet<string> = new Set([
  "v",
  "ns",
  "key",
  "background",
  "textIndexVersion",
  "2dsphereIndexVersion",
]);

export function isNamespaceNotFound(error: unknown): boolean {
  return (
    error instanceof MongoServerError &&
    (error.code === NAMESPACE_NOT_FOUND_CODE ||
      error.codeName === "NamespaceNotFound")
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function parseKeys(raw: unknown, namespace: string): IndexKeys {
  if (!isPlainObject(raw) || Object.keys(raw).length === 0) {
    throw new ReconcileError(
      "MalformedCatalogEntry",
      `Index document on '${namespace}' has no usable 'key' field`,
      { namespace }
    );
  }

  const keys: IndexKeys = {};
  for (const [field, token] of Object.entries(raw)) {
    if (typeof token === "number" || typeof token === "string") {
      keys[field] = token;
    } else {
      throw new ReconcileError(
        "MalformedCatalogEntry",
        `Index document on '${namespace}' has an unsupported token for field '${field}'`,
        { namespace }
      );
    }
  }
  return keys;
}

export function parseCatalogEntry(
  raw: Document,
  namespace: string
): IndexCatalogEntry {
  const keys = parseKeys(raw.key, namespace);

  if (typeof raw.name !== "string" || raw.name.length === 0) {
    throw new ReconcileError(
      "MalformedCatalogEntry",
      `Index document on '${namespace}' has no 'name' field`,
      { namespace }
    );
  }

  const options: IndexOptions = {};
  for (const [option, value] of Object.entries(raw)) {
    if (!BOOKKEEPING_OPTIONS.has(option)) {
      options[option] = value;
    }
  }

  return {
    name: raw.name,
    canonicalName: canonicalIndexName(keys),
    keys,
    options,
  };
}

/**
 * Fetch the collection's index catalog keyed by index name. A collection (or
 * database) that does not exist yet reads as an empty catalog. The primary-key
 * index is left out.
 */
export async function readIndexCatalog(
  db: DatabaseHandle,
  collectionName: string
): Promise<Map<string, IndexCatalogEntry>> {
  const collection = db.collection(collectionName);
  const namespace = collection.namespace;

  let rawIndexes: Document[];
  try {
    rawIndexes = await collection.listIndexes().toArray();
  } catch (error) {
    if (isNamespaceNotFound(error)) {
      return new Map();
    }
    throw new ReconcileError(
      "CatalogUnavailable",
      `Error while fetching current indexes for '${namespace}': ${describeError(error)}`,
      { namespace, cause: error }
    );
  }

  const catalog = new Map<string, IndexCatalogEntry>();
  for (const raw of rawIndexes) {
    const entry = parseCatalogEntry(raw, namespace);
    if (entry.name === PRIMARY_KEY_INDEX_NAME) {
      continue;
    }
    catalog.set(entry.name, entry);
  }
  return catalog;
}
