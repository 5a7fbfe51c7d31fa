import { IndexKeys } from "../types/indexes";

/** Name the server gives the implicit primary-key index. */
export const PRIMARY_KEY_INDEX_NAME = "_id_";

/**
 * Build the name the server would auto-assign to an index with these keys:
 * each field path and its token joined by underscores, e.g.
 * `{ email: 1, createdAt: -1 }` → `"email_1_createdAt_-1"`.
 * Key order is significant.
 */
export function canonicalIndexName(keys: IndexKeys): string {
  const parts: string[] = [];
  for (const [field, token] of Object.entries(keys)) {
    parts.push(field, String(token));
  }
  return parts.join("_");
}

export function isTextIndexKeys(keys: IndexKeys): boolean {
  return Object.values(keys).some((token) => token === "text");
}
