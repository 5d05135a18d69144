import {
     DirectSale,
     InventoryItem,
     Order,
     OrderStatus,
     StockHistoryEntry,
     Supplier,
} from '../types/inventory.types';
import { TransactionConflictError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
     byNameCaseInsensitive,
     ItemUpdate,
     LedgerStore,
     LedgerTransaction,
     NewStockHistoryEntry,
} from './ledger-store';

export interface MemoryLedgerStoreOptions {
     /** Simulated round-trip per store call */
     latencyMs?: number;
}

interface StoredOrder {
     order: Order;
     version: number;
}

/**
 * In-process ledger with optimistic concurrency control.
 *
 * Transactions read committed state, buffer their writes and validate every version they
 * depended on at commit. Validation and apply run without yielding, so a commit is atomic
 * with respect to every other transaction in the process.
 */
export class MemoryLedgerStore implements LedgerStore {
     private readonly items = new Map<string, InventoryItem>();
     private readonly history = new Map<string, StockHistoryEntry[]>();
     private readonly orders = new Map<string, StoredOrder>();
     private readonly sales = new Map<string, DirectSale>();
     private readonly suppliers = new Map<string, Supplier>();
     private historySequence = 0;

     constructor(private readonly options: MemoryLedgerStoreOptions = {}) {}

     async getItem(itemId: string): Promise<InventoryItem | null> {
          await this.roundTrip();
          return this.readItem(itemId);
     }

     async putItem(item: InventoryItem): Promise<void> {
          await this.roundTrip();
          // An overwrite bumps the stored version so open transactions see a conflict
          const current = this.items.get(item.id);
          this.items.set(item.id, {
               ...structuredClone(item),
               version: current ? current.version + 1 : item.version,
          });
     }

     async listItems(): Promise<InventoryItem[]> {
          await this.roundTrip();
          return [...this.items.values()].map((item) => structuredClone(item));
     }

     async appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void> {
          await this.roundTrip();
          this.writeHistory(itemId, entry);
     }

     async listHistory(itemId: string): Promise<StockHistoryEntry[]> {
          await this.roundTrip();
          return (this.history.get(itemId) ?? []).map((entry) => structuredClone(entry));
     }

     async runTransaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
          const tx = new MemoryLedgerTransaction(this);
          const result = await fn(tx);
          await this.roundTrip();
          tx.commit();
          return result;
     }

     async createOrder(order: Order): Promise<void> {
          await this.roundTrip();
          this.orders.set(order.id, { order: structuredClone(order), version: 1 });
     }

     async getOrder(orderId: string): Promise<Order | null> {
          await this.roundTrip();
          return this.readOrder(orderId)?.order ?? null;
     }

     async listOrders(status?: OrderStatus): Promise<Order[]> {
          await this.roundTrip();
          return [...this.orders.values()]
               .map(({ order }) => structuredClone(order))
               .filter((order) => !status || order.status === status)
               .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
     }

     async listCompletedOrders(from: Date, to: Date): Promise<Order[]> {
          const completed = await this.listOrders('completed');
          return completed.filter(
               (order) =>
                    order.completedAt !== undefined &&
                    order.completedAt.getTime() >= from.getTime() &&
                    order.completedAt.getTime() < to.getTime()
          );
     }

     async countOrders(): Promise<number> {
          await this.roundTrip();
          return this.orders.size;
     }

     async deleteProcessingOrder(orderId: string): Promise<boolean> {
          await this.roundTrip();
          const stored = this.orders.get(orderId);
          if (!stored || stored.order.status !== 'processing') {
               return false;
          }
          this.orders.delete(orderId);
          return true;
     }

     async getSale(saleId: string): Promise<DirectSale | null> {
          await this.roundTrip();
          return this.readSale(saleId);
     }

     async addSupplier(supplier: Supplier): Promise<void> {
          await this.roundTrip();
          this.suppliers.set(supplier.id, structuredClone(supplier));
     }

     async getSupplier(supplierId: string): Promise<Supplier | null> {
          await this.roundTrip();
          const supplier = this.suppliers.get(supplierId);
          return supplier ? structuredClone(supplier) : null;
     }

     async listSuppliers(): Promise<Supplier[]> {
          await this.roundTrip();
          return [...this.suppliers.values()]
               .map((supplier) => structuredClone(supplier))
               .sort(byNameCaseInsensitive);
     }

     async checkHealth(): Promise<boolean> {
          return true;
     }

     async close(): Promise<void> {
          logger.debug('In-memory ledger store closed');
     }

     // Internal accessors used by MemoryLedgerTransaction. Callers get copies.

     readItem(itemId: string): InventoryItem | null {
          const item = this.items.get(itemId);
          return item ? structuredClone(item) : null;
     }

     readOrder(orderId: string): StoredOrder | null {
          const stored = this.orders.get(orderId);
          return stored ? { order: structuredClone(stored.order), version: stored.version } : null;
     }

     readSale(saleId: string): DirectSale | null {
          const sale = this.sales.get(saleId);
          return sale ? structuredClone(sale) : null;
     }

     versionOf(key: TransactionKey): number {
          switch (key.kind) {
               case 'item':
                    return this.items.get(key.id)?.version ?? 0;
               case 'order':
                    return this.orders.get(key.id)?.version ?? 0;
               case 'sale':
                    return this.sales.has(key.id) ? 1 : 0;
          }
     }

     applyCommit(writes: PendingWrites): void {
          for (const item of writes.items.values()) {
               this.items.set(item.id, item);
          }
          for (const { itemId, entry } of writes.history) {
               this.writeHistory(itemId, entry);
          }
          for (const order of writes.orders.values()) {
               const current = this.orders.get(order.id);
               this.orders.set(order.id, { order, version: (current?.version ?? 0) + 1 });
          }
          for (const sale of writes.sales.values()) {
               this.sales.set(sale.id, sale);
          }
     }

     private writeHistory(itemId: string, entry: NewStockHistoryEntry): void {
          this.historySequence += 1;
          const entries = this.history.get(itemId) ?? [];
          entries.push({ ...structuredClone(entry), id: String(this.historySequence), itemId });
          this.history.set(itemId, entries);
     }

     private async roundTrip(): Promise<void> {
          const latencyMs = this.options.latencyMs ?? 0;
          if (latencyMs > 0) {
               await new Promise<void>((resolve) => setTimeout(resolve, latencyMs));
          }
     }
}

type TransactionKey = { kind: 'item' | 'order' | 'sale'; id: string };

interface PendingWrites {
     items: Map<string, InventoryItem>;
     history: Array<{ itemId: string; entry: NewStockHistoryEntry }>;
     orders: Map<string, Order>;
     sales: Map<string, DirectSale>;
}

class MemoryLedgerTransaction implements LedgerTransaction {
     /** Version each key had when this transaction depended on it (0 = absent) */
     private readonly expectations = new Map<string, { key: TransactionKey; version: number }>();
     private readonly writes: PendingWrites = {
          items: new Map(),
          history: [],
          orders: new Map(),
          sales: new Map(),
     };
     private committed = false;

     constructor(private readonly store: MemoryLedgerStore) {}

     async getItem(itemId: string): Promise<InventoryItem | null> {
          const items = await this.getItems([itemId]);
          return items.get(itemId) ?? null;
     }

     async getItems(itemIds: string[]): Promise<Map<string, InventoryItem>> {
          await Promise.resolve();
          const found = new Map<string, InventoryItem>();
          for (const itemId of itemIds) {
               const pending = this.writes.items.get(itemId);
               const item = pending ? structuredClone(pending) : this.store.readItem(itemId);
               this.expect({ kind: 'item', id: itemId }, item?.version ?? 0);
               if (item) {
                    found.set(itemId, item);
               }
          }
          return found;
     }

     async createItem(item: InventoryItem): Promise<void> {
          this.assertOpen();
          this.expect({ kind: 'item', id: item.id }, 0);
          this.writes.items.set(item.id, structuredClone(item));
     }

     async updateItem(item: InventoryItem, changes: ItemUpdate): Promise<void> {
          this.assertOpen();
          this.expect({ kind: 'item', id: item.id }, item.version);
          const base = this.writes.items.get(item.id) ?? item;
          this.writes.items.set(item.id, {
               ...structuredClone(base),
               ...changes,
               version: item.version + 1,
               updatedAt: new Date(),
          });
     }

     async appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void> {
          this.assertOpen();
          this.writes.history.push({ itemId, entry: structuredClone(entry) });
     }

     async getOrder(orderId: string): Promise<Order | null> {
          await Promise.resolve();
          const stored = this.store.readOrder(orderId);
          this.expect({ kind: 'order', id: orderId }, stored?.version ?? 0);
          return stored?.order ?? null;
     }

     async completeOrder(order: Order, completedAt: Date): Promise<void> {
          this.assertOpen();
          this.writes.orders.set(order.id, {
               ...structuredClone(order),
               status: 'completed',
               completedAt,
          });
     }

     async getSale(saleId: string): Promise<DirectSale | null> {
          await Promise.resolve();
          const sale = this.store.readSale(saleId);
          this.expect({ kind: 'sale', id: saleId }, sale ? 1 : 0);
          return sale;
     }

     async recordSale(sale: DirectSale): Promise<void> {
          this.assertOpen();
          this.expect({ kind: 'sale', id: sale.id }, 0);
          this.writes.sales.set(sale.id, structuredClone(sale));
     }

     commit(): void {
          this.assertOpen();
          this.committed = true;

          for (const { key, version } of this.expectations.values()) {
               if (this.store.versionOf(key) !== version) {
                    throw new TransactionConflictError(`${key.kind}:${key.id}`);
               }
          }

          this.store.applyCommit(this.writes);
     }

     private expect(key: TransactionKey, version: number): void {
          const id = `${key.kind}:${key.id}`;
          // The first observation is the one the transaction's decisions were based on
          if (!this.expectations.has(id)) {
               this.expectations.set(id, { key, version });
          }
     }

     private assertOpen(): void {
          if (this.committed) {
               throw new Error('Transaction already committed');
          }
     }
}
