import type { Field } from "./fields.js";

export type RenameErrorCode = "UNKNOWN_FIELD" | "MISSING_FIELD" | "METADATA_READ";

export abstract class RenameError extends Error {
  abstract readonly code: RenameErrorCode;
}

/** Template references a `%key` outside the known field set. */
export class UnknownFieldError extends RenameError {
  readonly code = "UNKNOWN_FIELD";

  constructor(readonly key: string) {
    super(`bad format key: ${key}`);
    this.name = "UnknownFieldError";
  }
}

/** The file's tags have no value for a field the template needs. */
export class MissingFieldError extends RenameError {
  readonly code = "MISSING_FIELD";

  constructor(readonly field: Field) {
    super(`missing required tag: ${field}`);
    this.name = "MissingFieldError";
  }
}

export class MetadataReadError extends RenameError {
  readonly code = "METADATA_READ";

  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(`${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "MetadataReadError";
  }
}

export function isRenameError(value: unknown): value is RenameError {
  return value instanceof RenameError;
}
