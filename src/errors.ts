export type DocumentOperation = "read" | "write";

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** The docs tree itself is unusable; nothing can be processed. */
export class EnvironmentError extends Error {
  readonly kind = "environment";

  constructor(message: string) {
    super(message);
    this.name = "EnvironmentError";
  }
}

export class ConfigError extends Error {
  readonly kind = "config";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A single document could not be read or written. Collected per run; the
 * remaining documents are still processed.
 */
export class DocumentIoError extends Error {
  readonly kind = "document-io";
  readonly path: string;
  readonly operation: DocumentOperation;

  constructor(path: string, operation: DocumentOperation, cause: unknown) {
    super(`Error processing ${path}: ${getErrorMessage(cause)}`, { cause });
    this.name = "DocumentIoError";
    this.path = path;
    this.operation = operation;
  }
}
