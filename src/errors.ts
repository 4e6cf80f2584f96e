export class SearchConfigurationError extends Error {
  override readonly name = 'SearchConfigurationError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadSearchValueError extends Error {
  override readonly name = 'BadSearchValueError';

  constructor(
    readonly field: string,
    readonly value: unknown,
    message?: string,
    override readonly cause?: unknown,
  ) {
    super(message ?? `Bad search value for "${field}": ${String(value)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
