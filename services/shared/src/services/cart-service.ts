import { randomUUID } from 'crypto';
import {
     CartLine,
     CartUpdate,
     InventoryItem,
     SettlementKind,
     SettlementLine,
     SettlementRequest,
} from '../types/inventory.types';
import { InvalidItemError, InvalidQuantityError } from '../utils/errors';
import { logger } from '../utils/logger';
import { linesTotal } from '../utils/money';
import { DEFAULT_RETRY_POLICY, retryingStoreCall, RetryPolicy, StoreCall } from '../utils/retry';
import { LedgerStore } from '../store/ledger-store';

/**
 * Reject malformed lines before any store round-trip: empty requests, non-positive or
 * fractional quantities, and item ids repeated within one request.
 */
export function validateSettlementLines(lines: SettlementLine[]): void {
     if (!lines || lines.length === 0) {
          throw new InvalidQuantityError('Settlement must have at least one line');
     }

     const seen = new Set<string>();
     for (const line of lines) {
          if (typeof line.itemId !== 'string' || line.itemId.trim() === '') {
               throw new InvalidItemError('Every line must reference an item id');
          }
          if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
               throw new InvalidQuantityError(
                    `Quantity must be a positive integer for item ${line.itemId}`
               );
          }
          if (seen.has(line.itemId)) {
               throw new InvalidItemError(`Item ${line.itemId} appears more than once`);
          }
          seen.add(line.itemId);
     }
}

export function buildSettlementRequest(
     kind: SettlementKind,
     reference: string,
     lines: SettlementLine[],
     requestId: string = randomUUID()
): SettlementRequest {
     validateSettlementLines(lines);
     return {
          requestId,
          kind,
          reference,
          lines: lines.map(({ itemId, quantity }) => ({ itemId, quantity })),
     };
}

export function cartTotal(cart: CartLine[]): number {
     return linesTotal(cart);
}

function toCartLine(item: InventoryItem, quantity: number): CartLine {
     return {
          itemId: item.id,
          name: item.name,
          quantity,
          purchasePrice: item.purchasePrice,
          salePrice: item.salePrice,
          availableQuantity: item.quantity,
     };
}

/**
 * Add `quantity` units of an item to an order being drafted, merging with an existing
 * line. Stock figures here are advisory; settlement re-reads them.
 */
export function addItemToOrderList(
     item: InventoryItem,
     cart: CartLine[],
     quantity: number
): CartUpdate {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          return { cart, status: 'error', message: 'Quantity must be a positive integer.' };
     }

     if (item.quantity < quantity) {
          return {
               cart,
               status: 'warning',
               message: `Insufficient stock for '${item.name}'. Available: ${item.quantity}`,
          };
     }

     const existing = cart.find((line) => line.itemId === item.id);
     if (!existing) {
          return {
               cart: [...cart, toCartLine(item, quantity)],
               status: 'success',
               message: `'${item.name}' added to the order.`,
          };
     }

     const total = existing.quantity + quantity;
     if (item.quantity < total) {
          return {
               cart,
               status: 'warning',
               message: `Cannot add ${quantity} more. Total stock: ${item.quantity}, already in order: ${existing.quantity}`,
          };
     }

     return {
          cart: cart.map((line) => (line.itemId === item.id ? toCartLine(item, total) : line)),
          status: 'success',
          message: `Quantity of '${item.name}' updated to ${total}.`,
     };
}

export class CartService {
     private readonly call: StoreCall;

     constructor(
          private readonly store: LedgerStore,
          retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
          sleep?: (ms: number) => Promise<void>
     ) {
          this.call = retryingStoreCall(retryPolicy, sleep);
     }

     /**
      * Point-of-sale scan: add one unit of the scanned product, or one more of a product
      * already in the sale while stock allows.
      */
     async addItemToSale(barcode: string, cart: CartLine[]): Promise<CartUpdate> {
          const code = barcode.trim();
          if (!code) {
               return { cart, status: 'error', message: 'Barcode cannot be empty.' };
          }

          let found: InventoryItem | null;
          try {
               found = await this.call(`scan ${code}`, () => this.store.getItem(code));
          } catch (error) {
               logger.error({ err: error, barcode: code }, 'Failed to look up scanned item');
               return {
                    cart,
                    status: 'error',
                    message: error instanceof Error ? error.message : 'Item lookup failed',
               };
          }

          if (!found) {
               return { cart, status: 'error', message: `Product with code '${code}' not found.` };
          }

          const item = found;
          if (item.quantity <= 0) {
               return { cart, status: 'warning', message: `Out of stock for '${item.name}'!` };
          }

          const existing = cart.find((line) => line.itemId === item.id);
          if (!existing) {
               return {
                    cart: [...cart, toCartLine(item, 1)],
                    status: 'success',
                    message: `'${item.name}' added to the sale.`,
               };
          }

          if (item.quantity <= existing.quantity) {
               return {
                    cart,
                    status: 'warning',
                    message: `No more stock available for '${item.name}'.`,
               };
          }

          const total = existing.quantity + 1;
          return {
               cart: cart.map((line) => (line.itemId === item.id ? toCartLine(item, total) : line)),
               status: 'success',
               message: `'${item.name}' (+1). Total: ${total}`,
          };
     }
}
