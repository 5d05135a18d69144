import {
     DirectSale,
     InventoryItem,
     Order,
     OrderStatus,
     StockHistoryEntry,
     Supplier,
} from '../types/inventory.types';

export type NewStockHistoryEntry = Omit<StockHistoryEntry, 'id' | 'itemId'>;

/**
 * Fields written by {@link LedgerTransaction.updateItem}. `version` is bumped by the store.
 */
export type ItemUpdate = Partial<
     Pick<
          InventoryItem,
          | 'name'
          | 'quantity'
          | 'purchasePrice'
          | 'salePrice'
          | 'minStockAlert'
          | 'supplierId'
          | 'supplierName'
     >
>;

/**
 * Unit of work opened by {@link LedgerStore.runTransaction}.
 *
 * Reads observe a consistent snapshot. Writes are conditional on the version of the
 * record that was read; a concurrent committed write makes the whole transaction fail
 * with a TransactionConflictError and nothing is applied.
 */
export interface LedgerTransaction {
     getItem(itemId: string): Promise<InventoryItem | null>;
     getItems(itemIds: string[]): Promise<Map<string, InventoryItem>>;
     createItem(item: InventoryItem): Promise<void>;
     updateItem(item: InventoryItem, changes: ItemUpdate): Promise<void>;
     appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void>;

     getOrder(orderId: string): Promise<Order | null>;
     completeOrder(order: Order, completedAt: Date): Promise<void>;

     getSale(saleId: string): Promise<DirectSale | null>;
     recordSale(sale: DirectSale): Promise<void>;
}

export interface LedgerStore {
     /** Point read, outside any transaction */
     getItem(itemId: string): Promise<InventoryItem | null>;
     /**
      * Unconditional point write for restores and fixtures. Overwriting bumps the version,
      * so open transactions that read the item fail at commit. Edits go through
      * runTransaction.
      */
     putItem(item: InventoryItem): Promise<void>;
     listItems(): Promise<InventoryItem[]>;

     appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void>;
     listHistory(itemId: string): Promise<StockHistoryEntry[]>;

     runTransaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T>;

     createOrder(order: Order): Promise<void>;
     getOrder(orderId: string): Promise<Order | null>;
     listOrders(status?: OrderStatus): Promise<Order[]>;
     listCompletedOrders(from: Date, to: Date): Promise<Order[]>;
     countOrders(): Promise<number>;
     /** Deletes the order only while it is still processing. Returns false otherwise. */
     deleteProcessingOrder(orderId: string): Promise<boolean>;

     getSale(saleId: string): Promise<DirectSale | null>;

     addSupplier(supplier: Supplier): Promise<void>;
     getSupplier(supplierId: string): Promise<Supplier | null>;
     listSuppliers(): Promise<Supplier[]>;

     checkHealth(): Promise<boolean>;
     close(): Promise<void>;
}

export function byNameCaseInsensitive<T extends { name: string }>(a: T, b: T): number {
     return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}
