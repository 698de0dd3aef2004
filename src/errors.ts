/**
 * Error types shared across the server
 */

export type ResolverErrorCode =
  | 'UNKNOWN_TYPE'        // Label does not name an element of the taxonomy
  | 'TAXONOMY_LOAD_ERROR' // Model could not be read, parsed or validated
  | 'SERVICE_ERROR'       // Upstream HTTP service failed
  | 'VALIDATION_ERROR';   // Tool input rejected before any work was done

export class ResolverError extends Error {
  constructor(
    message: string,
    public readonly code: ResolverErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResolverError';
  }

  toJSON(): { code: ResolverErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class UnknownTypeError extends ResolverError {
  constructor(public readonly label: string) {
    super(`Unknown type '${label}'`, 'UNKNOWN_TYPE', { label });
    this.name = 'UnknownTypeError';
  }
}

export class TaxonomyLoadError extends ResolverError {
  constructor(message: string, public readonly source: string, cause?: unknown) {
    super(`Failed to load taxonomy from ${source}: ${message}`, 'TAXONOMY_LOAD_ERROR', { source });
    this.name = 'TaxonomyLoadError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ValidationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
