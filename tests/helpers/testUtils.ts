import { MemoryLedgerStore } from '@stock-ledger/shared/src/store/memory-ledger-store';
import { LedgerStore } from '@stock-ledger/shared/src/store/ledger-store';
import { AuditLogWriter } from '@stock-ledger/shared/src/services/audit-log';
import { AlertEmitter } from '@stock-ledger/shared/src/notifications/alert-emitter';
import { RetryPolicy } from '@stock-ledger/shared/src/utils/retry';
import type { InventoryItem, Order, PricedLine } from '@stock-ledger/shared/src/types/inventory.types';

/**
 * Test utilities for building ledger state without going through the services
 */

export const FAST_RETRY: RetryPolicy = {
     maxAttempts: 3,
     baseDelayMs: 1,
     backoffMultiplier: 2,
};

export const noSleep = async (): Promise<void> => {};

export const TEST_CREATED_AT = new Date('2024-05-01T09:00:00.000Z');

export class RecordingAlertEmitter implements AlertEmitter {
     readonly messages: string[] = [];

     async notify(message: string): Promise<void> {
          this.messages.push(message);
     }
}

export class FailingAlertEmitter implements AlertEmitter {
     calls = 0;

     async notify(): Promise<void> {
          this.calls += 1;
          throw new Error('Notification channel down');
     }
}

export type TestItemInput = Partial<InventoryItem> & { id: string; quantity: number };

export function makeItem(input: TestItemInput): InventoryItem {
     return {
          name: `Item ${input.id}`,
          purchasePrice: 1,
          salePrice: 2,
          version: 1,
          createdAt: TEST_CREATED_AT,
          updatedAt: TEST_CREATED_AT,
          ...input,
     };
}

/**
 * Store an item with the INITIAL_STOCK entry that makes its history reconcile
 */
export async function seedItem(store: LedgerStore, input: TestItemInput): Promise<InventoryItem> {
     const item = makeItem(input);
     await store.putItem(item);
     await new AuditLogWriter(store).recordInitialStock(store, item);
     return item;
}

export function createTestStore(latencyMs = 0): MemoryLedgerStore {
     return new MemoryLedgerStore({ latencyMs });
}

export async function createTestOrder(
     store: LedgerStore,
     id: string,
     lines: Array<{ item: InventoryItem; quantity: number }>,
     title = `Test order ${id}`
): Promise<Order> {
     const ingredients: PricedLine[] = lines.map(({ item, quantity }) => ({
          itemId: item.id,
          name: item.name,
          quantity,
          purchasePrice: item.purchasePrice,
          salePrice: item.salePrice,
     }));
     const order: Order = {
          id,
          title,
          price: ingredients.reduce((sum, line) => sum + line.salePrice * line.quantity, 0),
          ingredients,
          status: 'processing',
          createdAt: TEST_CREATED_AT,
     };
     await store.createOrder(order);
     return order;
}

export async function getQuantity(store: LedgerStore, itemId: string): Promise<number | undefined> {
     const item = await store.getItem(itemId);
     return item?.quantity;
}
