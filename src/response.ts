import { ConflictError, ValidationError, isCatalogError, type CatalogErrorCode } from './errors';

/** Envelope every successful operation is reported in. */
export interface StandardResponse<T> {
  readonly statusCode: number;
  readonly message: string;
  readonly data: T;
}

export interface ErrorResponse {
  readonly statusCode: number;
  /** Stable discriminant callers branch on; `internal` for non-catalog errors */
  readonly code: CatalogErrorCode | 'internal';
  readonly message: string;
  readonly existingId?: number;
  readonly issues?: readonly string[];
}

export const STATUS_BY_CODE: Readonly<Record<CatalogErrorCode, number>> = {
  not_found: 404,
  conflict: 409,
  validation: 422,
  no_messages: 404,
  transport: 502,
  decode: 502,
  store: 500,
};

export function toStandardResponse<T>(statusCode: number, message: string, data: T): StandardResponse<T> {
  return { statusCode, message, data };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (!isCatalogError(error)) {
    return {
      statusCode: 500,
      code: 'internal',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const base = { statusCode: STATUS_BY_CODE[error.code], code: error.code, message: error.message };
  if (error instanceof ConflictError) {
    return { ...base, existingId: error.existingId };
  }
  if (error instanceof ValidationError) {
    return { ...base, issues: error.issues };
  }
  return base;
}
