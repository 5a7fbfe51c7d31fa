/**
 * Error types surfaced by index reconciliation, migrations, model definitions
 * and configuration. Driver failures are kept as `cause`.
 */

export type ReconcileErrorKind =
  | "CatalogUnavailable"
  | "MalformedCatalogEntry"
  | "IndexOperationFailed"
  | "InvalidIndexDeclaration"
  | "DuplicateIndexName";

export class ReconcileError extends Error {
  readonly kind: ReconcileErrorKind;
  readonly namespace?: string;
  readonly indexName?: string;

  constructor(
    kind: ReconcileErrorKind,
    message: string,
    options?: { namespace?: string; indexName?: string; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ReconcileError";
    this.kind = kind;
    this.namespace = options?.namespace;
    this.indexName = options?.indexName;
  }
}

export type MigrationErrorKind =
  | "MigrationDeclarationInvalid"
  | "MigrationWriteFailed";

export class MigrationError extends Error {
  readonly kind: MigrationErrorKind;
  readonly migrationName: string;

  constructor(
    kind: MigrationErrorKind,
    migrationName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "MigrationError";
    this.kind = kind;
    this.migrationName = migrationName;
  }
}

export class ModelDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelDefinitionError";
  }
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

// Readable detail for log lines and wrapped error messages
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
