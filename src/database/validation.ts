// Collection naming rules enforced by the server
export function isValidCollectionName(name: string): boolean {
  if (!name || name.length === 0 || name.length > 255) {
    return false;
  }

  if (name.includes("$") || name.includes("\0")) {
    return false;
  }

  // Reserved for the server's own collections
  if (name.startsWith("system.")) {
    return false;
  }

  return !name.startsWith(".") && !name.endsWith(".");
}

export function isValidDatabaseName(name: string): boolean {
  if (!name || name.length === 0 || name.length >= 64) {
    return false;
  }
  return !/[/\\. "$*<>:|?\0]/.test(name);
}
