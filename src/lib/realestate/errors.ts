export interface ValidationErrorDetails {
  /** 1-based position of the offending record */
  index?: number;
  field?: string;
}

/**
 * Malformed inventory or criteria input. Always fatal to the ingestion call
 * that raised it.
 */
export class ValidationError extends Error {
  readonly index?: number;
  readonly field?: string;

  constructor(message: string, details: ValidationErrorDetails = {}) {
    super(message);
    this.name = 'ValidationError';
    this.index = details.index;
    this.field = details.field;
  }
}

/**
 * The inventory could not be read or fetched.
 */
export class RetrievalError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalError';
    this.source = source;
  }
}
