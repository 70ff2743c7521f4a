/**
 * Error taxonomy
 *
 * - usage: bad argument or missing target, the user has to fix the invocation
 * - no-data: nothing to pick from (unusable feed, every draw rejected)
 * - storage: a cache or lock file could not be opened, written or removed
 *
 * Recoverable problems never become errors; they are tracked and logged.
 */

export type PickerErrorKind = "usage" | "no-data" | "storage";

export class PickerError extends Error {
  readonly kind: PickerErrorKind;

  constructor(kind: PickerErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PickerError";
    this.kind = kind;
  }

  /** Process exit code for this error */
  get exitCode(): number {
    return this.kind === "usage" ? 2 : 1;
  }
}

export class UsageError extends PickerError {
  constructor(message: string, options?: ErrorOptions) {
    super("usage", message, options);
    this.name = "UsageError";
  }
}

export class NoDataError extends PickerError {
  constructor(message: string, options?: ErrorOptions) {
    super("no-data", message, options);
    this.name = "NoDataError";
  }
}

export class StorageError extends PickerError {
  constructor(message: string, options?: ErrorOptions) {
    super("storage", message, options);
    this.name = "StorageError";
  }
}
