/**
 * Error taxonomy of the catalog.
 *
 * Every error the library raises extends {@link CatalogError} and carries a
 * stable `code`. Callers branch on the code, never on the message text.
 */

export type CatalogErrorCode =
  | 'not_found'
  | 'conflict'
  | 'validation'
  | 'no_messages'
  | 'transport'
  | 'decode'
  | 'store';

export type ResourceKind = 'broker' | 'topic' | 'dataset' | 'dataset_message';

export abstract class CatalogError extends Error {
  abstract readonly code: CatalogErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CatalogError {
  readonly code = 'not_found';

  constructor(
    readonly resource: ResourceKind,
    readonly id: number | null,
    message?: string
  ) {
    super(message ?? (id === null ? `No ${resource} defined` : `${resource} ${id} not found`));
  }
}

export class ConflictError extends CatalogError {
  readonly code = 'conflict';

  constructor(
    readonly resource: ResourceKind,
    /** Id of the row that already holds the unique key */
    readonly existingId: number
  ) {
    super(`${resource} ${existingId} already exists`);
  }
}

export class ValidationError extends CatalogError {
  readonly code = 'validation';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid input: ${issues.join('; ')}`);
  }
}

export class NoMessagesFoundError extends CatalogError {
  readonly code = 'no_messages';

  constructor(readonly topicName: string) {
    super(`No messages in stream topic: ${topicName}`);
  }
}

export class TransportError extends CatalogError {
  readonly code = 'transport';

  constructor(readonly endpoint: string, cause: unknown) {
    super(`Unable to read from broker ${endpoint}: ${describe(cause)}`, { cause });
  }
}

export class DecodeError extends CatalogError {
  readonly code = 'decode';

  constructor(readonly topicName: string, readonly offset: string, cause: unknown) {
    super(`Unable to decode message at offset ${offset} of topic ${topicName}: ${describe(cause)}`, { cause });
  }
}

export class StoreError extends CatalogError {
  readonly code = 'store';

  constructor(operation: string, cause: unknown) {
    super(`Metadata store error during ${operation}: ${describe(cause)}`, { cause });
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

/**
 * Pass catalog errors through, wrap anything else as a StoreError.
 */
export function toCatalogError(operation: string, error: unknown): CatalogError {
  return isCatalogError(error) ? error : new StoreError(operation, error);
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
