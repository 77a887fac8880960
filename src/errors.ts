/**
 * Raised when submitted input is missing or malformed.
 * `fields` maps each offending field to a message for the form.
 */
export class ValidationError extends Error {
  readonly fields: Record<string, string>;

  constructor(fields: Record<string, string>) {
    super(`Invalid fields: ${Object.keys(fields).join(', ')}`);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

/**
 * Raised when the note store cannot be reached or fails an operation.
 * The underlying failure is kept as `cause` for logging only.
 */
export class StoreUnavailableError extends Error {
  constructor(cause: unknown) {
    super('Note store unavailable', { cause });
    this.name = 'StoreUnavailableError';
  }
}
