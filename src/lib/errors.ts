import type { ZodIssue } from 'zod';

export type CatalogErrorCode =
  | 'invalid_request'
  | 'snapshot_unavailable'
  | 'source_tables_missing'
  | 'internal_error';

export interface CatalogErrorDetails {
  status: number;
  code: CatalogErrorCode;
}

export class CatalogError extends Error {
  readonly status: number;
  readonly code: CatalogErrorCode;

  constructor(message: string, details: CatalogErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
    this.status = details.status;
    this.code = details.code;
  }
}

export class CatalogValidationError extends CatalogError {
  readonly field: string;
  readonly issues: ZodIssue[];

  constructor(field: string, message: string, issues: ZodIssue[] = []) {
    super(message, { status: 400, code: 'invalid_request' });
    this.name = 'CatalogValidationError';
    this.field = field;
    this.issues = issues;
  }
}

/** The catalog snapshot could not be read. Not retried at this layer. */
export class SnapshotUnavailableError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { status: 503, code: 'snapshot_unavailable' }, options);
    this.name = 'SnapshotUnavailableError';
  }
}

/** Neither ingestion table exists, so there is nothing to build the view from. */
export class SourceTablesMissingError extends CatalogError {
  constructor(message: string) {
    super(message, { status: 400, code: 'source_tables_missing' });
    this.name = 'SourceTablesMissingError';
  }
}

export type ErrorResponse = {
  status: number;
  body: {
    error: CatalogErrorCode;
    message: string;
    field?: string;
  };
};

export const toErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof CatalogValidationError) {
    return {
      status: error.status,
      body: { error: error.code, message: error.message, field: error.field },
    };
  }
  if (error instanceof CatalogError) {
    return { status: error.status, body: { error: error.code, message: error.message } };
  }
  return {
    status: 500,
    body: { error: 'internal_error', message: 'Internal server error' },
  };
};
