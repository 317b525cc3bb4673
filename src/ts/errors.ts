/**
 * Error taxonomy. Everything thrown by the library extends TypedDataError.
 */

export class TypedDataError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TypedDataError';
  }
}

/**
 * Invalid member type parameters, identifiers or struct declarations.
 */
export class SchemaDefinitionError extends TypedDataError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * A value does not fit the member type it is assigned to, or is missing.
 */
export class ValidationError extends TypedDataError {
  /** Member path such as `Mail.to.wallet`, when known */
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ValidationError';
    this.path = path;
  }
}

/**
 * The struct graph or the signing context cannot be resolved.
 */
export class ResolutionError extends TypedDataError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}
