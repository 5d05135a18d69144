import {
     InventoryItem,
     InventoryItemPatch,
     NewInventoryItem,
     ScanResult,
     StockHistoryEntry,
} from '../types/inventory.types';
import {
     InvalidItemError,
     InvalidQuantityError,
     ItemAlreadyExistsError,
     ItemNotFoundError,
     SupplierNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import {
     DEFAULT_RETRY_POLICY,
     retryingStoreCall,
     RetryPolicy,
     StoreCall,
     withRetry,
} from '../utils/retry';
import { byNameCaseInsensitive, ItemUpdate, LedgerStore } from '../store/ledger-store';
import { AuditLogWriter } from './audit-log';

function assertStockCount(value: number, field: string): void {
     if (!Number.isInteger(value) || value < 0) {
          throw new InvalidQuantityError(`${field} must be a non-negative integer`);
     }
}

function assertPrice(value: number, field: string): void {
     if (!Number.isFinite(value) || value < 0) {
          throw new InvalidItemError(`${field} must be a non-negative number`);
     }
}

function validatePatch(patch: InventoryItemPatch): void {
     if (patch.name !== undefined && patch.name.trim() === '') {
          throw new InvalidItemError('Item name cannot be empty');
     }
     if (patch.quantity !== undefined) assertStockCount(patch.quantity, 'quantity');
     if (patch.purchasePrice !== undefined) assertPrice(patch.purchasePrice, 'purchasePrice');
     if (patch.salePrice !== undefined) assertPrice(patch.salePrice, 'salePrice');
     if (patch.minStockAlert !== undefined && patch.minStockAlert !== null) {
          assertStockCount(patch.minStockAlert, 'minStockAlert');
     }
}

/**
 * Item registration, manual edits and read models over the ledger.
 *
 * Every write runs in a ledger transaction together with its history entry, so manual
 * edits compete with settlements under the same conflict detection.
 */
export class InventoryService {
     private readonly audit: AuditLogWriter;
     private readonly call: StoreCall;

     constructor(
          private readonly store: LedgerStore,
          private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
          private readonly sleep?: (ms: number) => Promise<void>
     ) {
          this.audit = new AuditLogWriter(store, retryPolicy, sleep);
          this.call = retryingStoreCall(retryPolicy, sleep);
     }

     async registerItem(input: NewInventoryItem): Promise<InventoryItem> {
          const id = input.id?.trim();
          const name = input.name?.trim();
          if (!id) {
               throw new InvalidItemError('Item id is required');
          }
          if (!name) {
               throw new InvalidItemError('Item name is required');
          }
          assertStockCount(input.quantity, 'quantity');
          const purchasePrice = input.purchasePrice ?? 0;
          const salePrice = input.salePrice ?? 0;
          assertPrice(purchasePrice, 'purchasePrice');
          assertPrice(salePrice, 'salePrice');
          if (input.minStockAlert !== undefined) {
               assertStockCount(input.minStockAlert, 'minStockAlert');
          }

          const supplierName = input.supplierId
               ? await this.resolveSupplierName(input.supplierId)
               : undefined;

          const now = new Date();
          const item: InventoryItem = {
               id,
               name,
               quantity: input.quantity,
               purchasePrice,
               salePrice,
               minStockAlert: input.minStockAlert,
               supplierId: input.supplierId || undefined,
               supplierName,
               version: 1,
               createdAt: now,
               updatedAt: now,
          };

          await withRetry(
               () =>
                    this.store.runTransaction(async (tx) => {
                         if (await tx.getItem(id)) {
                              throw new ItemAlreadyExistsError(id);
                         }
                         await tx.createItem(item);
                         await this.audit.recordInitialStock(tx, item);
                    }),
               this.retryPolicy,
               { operation: `register item ${id}`, sleep: this.sleep }
          );

          logger.info({ itemId: id, quantity: item.quantity }, 'Inventory item registered');
          return item;
     }

     /**
      * Apply a manual edit. A quantity change is recorded as a MANUAL_ADJUSTMENT of the
      * difference; edits that leave the quantity alone write no history.
      */
     async updateItem(
          itemId: string,
          patch: InventoryItemPatch,
          details?: string
     ): Promise<InventoryItem> {
          validatePatch(patch);

          const changes: ItemUpdate = {};
          if (patch.name !== undefined) changes.name = patch.name.trim();
          if (patch.quantity !== undefined) changes.quantity = patch.quantity;
          if (patch.purchasePrice !== undefined) changes.purchasePrice = patch.purchasePrice;
          if (patch.salePrice !== undefined) changes.salePrice = patch.salePrice;
          if (patch.minStockAlert !== undefined) {
               changes.minStockAlert = patch.minStockAlert ?? undefined;
          }
          if (patch.supplierId !== undefined) {
               changes.supplierId = patch.supplierId || undefined;
               changes.supplierName = patch.supplierId
                    ? await this.resolveSupplierName(patch.supplierId)
                    : undefined;
          }

          const { updated, delta } = await withRetry(
               () =>
                    this.store.runTransaction(async (tx) => {
                         const item = await tx.getItem(itemId);
                         if (!item) {
                              throw new ItemNotFoundError(itemId);
                         }

                         const quantityChange =
                              changes.quantity === undefined ? 0 : changes.quantity - item.quantity;

                         await tx.updateItem(item, changes);
                         await this.audit.recordManualAdjustment(
                              tx,
                              itemId,
                              quantityChange,
                              details
                         );

                         const result: InventoryItem = {
                              ...item,
                              ...changes,
                              version: item.version + 1,
                              updatedAt: new Date(),
                         };
                         return { updated: result, delta: quantityChange };
                    }),
               this.retryPolicy,
               { operation: `update item ${itemId}`, sleep: this.sleep }
          );

          logger.info({ itemId, quantityChange: delta }, 'Inventory item updated');
          return updated;
     }

     async getItem(itemId: string): Promise<InventoryItem> {
          const item = await this.call(`get item ${itemId}`, () => this.store.getItem(itemId));
          if (!item) {
               throw new ItemNotFoundError(itemId);
          }
          return item;
     }

     /** Items sorted by name; `search` matches name or id, case-insensitively */
     async listItems(search?: string): Promise<InventoryItem[]> {
          const items = await this.call('list items', () => this.store.listItems());
          const term = search?.trim().toLowerCase();
          const matching = term
               ? items.filter(
                      (item) =>
                           item.name.toLowerCase().includes(term) ||
                           item.id.toLowerCase().includes(term)
                 )
               : items;
          return [...matching].sort(byNameCaseInsensitive);
     }

     /** Newest entry first */
     async getHistory(itemId: string): Promise<StockHistoryEntry[]> {
          await this.getItem(itemId);
          const entries = await this.call(`list history of ${itemId}`, () =>
               this.store.listHistory(itemId)
          );
          return [...entries]
               .reverse()
               .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
     }

     async getLowStockItems(): Promise<InventoryItem[]> {
          const items = await this.listItems();
          return items.filter(
               (item) => item.minStockAlert !== undefined && item.quantity <= item.minStockAlert
          );
     }

     async scanBarcode(barcode: string): Promise<ScanResult> {
          const code = barcode.trim();
          if (!code) {
               return { status: 'error', message: 'Barcode cannot be empty.' };
          }

          try {
               const item = await this.call(`scan ${code}`, () => this.store.getItem(code));
               return item ? { status: 'found', item } : { status: 'not_found', barcode: code };
          } catch (error) {
               logger.error({ err: error, barcode: code }, 'Barcode lookup failed');
               return {
                    status: 'error',
                    message: error instanceof Error ? error.message : 'Barcode lookup failed',
               };
          }
     }

     private async resolveSupplierName(supplierId: string): Promise<string> {
          const supplier = await this.call(`get supplier ${supplierId}`, () =>
               this.store.getSupplier(supplierId)
          );
          if (!supplier) {
               throw new SupplierNotFoundError(supplierId);
          }
          return supplier.name;
     }
}
