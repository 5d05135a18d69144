// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly itemId: string,
          public readonly itemName: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for '${itemName}' (${itemId}): requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }
}

export class ItemNotFoundError extends DomainError {
     constructor(public readonly itemId: string) {
          super(`Inventory item ${itemId} not found`, 'ITEM_NOT_FOUND', 404);
     }
}

export class ItemAlreadyExistsError extends DomainError {
     constructor(public readonly itemId: string) {
          super(`Inventory item ${itemId} already exists`, 'ITEM_ALREADY_EXISTS', 409);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class InvalidItemError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_ITEM', 400);
     }
}

export class OrderNotFoundError extends DomainError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
     }
}

export class OrderAlreadySettledError extends DomainError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} has already been completed`, 'ORDER_ALREADY_SETTLED', 409);
     }
}

export class OrderNotCancellableError extends DomainError {
     constructor(public readonly orderId: string) {
          super(
               `Order ${orderId} is completed and can no longer be cancelled`,
               'ORDER_NOT_CANCELLABLE',
               409
          );
     }
}

export class SaleAlreadyRecordedError extends DomainError {
     constructor(public readonly saleId: string) {
          super(`Sale ${saleId} has already been recorded`, 'SALE_ALREADY_RECORDED', 409);
     }
}

export class SupplierNotFoundError extends DomainError {
     constructor(public readonly supplierId: string) {
          super(`Supplier ${supplierId} not found`, 'SUPPLIER_NOT_FOUND', 404);
     }
}

/**
 * Ledger quantity and summed history disagree. Never expected in correct operation.
 */
export class InvariantViolationError extends Error {
     public readonly code = 'INVARIANT_VIOLATION';

     constructor(
          public readonly itemId: string,
          public readonly quantity: number,
          public readonly historyTotal: number
     ) {
          super(
               `Reconciliation mismatch for item ${itemId}: quantity ${quantity}, history total ${historyTotal}`
          );
          this.name = 'InvariantViolationError';
     }
}

/**
 * Connectivity or contention failure of the backing store. Safe to retry.
 */
export class TransientStoreError extends Error {
     public readonly retriable = true;

     constructor(message: string, options?: { cause?: unknown }) {
          super(message, options);
          this.name = this.constructor.name;
     }
}

export class TransactionConflictError extends TransientStoreError {
     constructor(
          public readonly key: string,
          options?: { cause?: unknown }
     ) {
          super(`Transaction aborted: concurrent write on ${key}`, options);
     }
}

export class RetryExhaustedError extends Error {
     constructor(
          public readonly operation: string,
          public readonly attempts: number,
          public readonly lastError: unknown
     ) {
          super(
               `${operation} failed after ${attempts} attempts: ${
                    lastError instanceof Error ? lastError.message : String(lastError)
               }`,
               { cause: lastError }
          );
          this.name = 'RetryExhaustedError';
     }
}
