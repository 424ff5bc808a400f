export type FatalErrorCode = 'NO_INVENTORY' | 'NO_ORDER_BATCH';

/**
 * Run-level failure. Raised before any order row is processed, so no
 * partial output exists when one of these escapes.
 */
export class ReconciliationFatalError extends Error {
  constructor(
    message: string,
    readonly code: FatalErrorCode,
  ) {
    super(message);
    this.name = 'ReconciliationFatalError';
  }
}

export class NoInventoryError extends ReconciliationFatalError {
  constructor(message = 'No usable inventory') {
    super(message, 'NO_INVENTORY');
    this.name = 'NoInventoryError';
  }
}

export class MissingOrderBatchError extends ReconciliationFatalError {
  constructor(message = 'No order batch supplied') {
    super(message, 'NO_ORDER_BATCH');
    this.name = 'MissingOrderBatchError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
