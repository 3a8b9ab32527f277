import type { StoreErrorCode, StoreFailure } from './record_store.types';

/**
 * Typed error thrown by table stores.
 * RecordStore catches it at the operation boundary and turns it into a StoreFailure.
 */
export class RecordStoreError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: StoreErrorCode,
    /** Table the operation targeted (if applicable) */
    public readonly table?: string,
  ) {
    super(message);
    this.name = 'RecordStoreError';
    Object.setPrototypeOf(this, RecordStoreError.prototype);
  }
}

/**
 * Normalizes anything thrown by a table store into a StoreFailure.
 * Unknown errors are attributed to the active mode via `fallbackCode`.
 */
export function toStoreFailure(error: unknown, table: string, fallbackCode: StoreErrorCode): StoreFailure {
  if (error instanceof RecordStoreError) {
    return { code: error.code, message: error.message, table: error.table ?? table };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallbackCode, message, table };
}
