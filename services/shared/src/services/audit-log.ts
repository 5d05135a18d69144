import {
     InventoryItem,
     ReconciliationReport,
     StockHistoryEntry,
     StockHistoryType,
} from '../types/inventory.types';
import { InvariantViolationError, ItemNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, retryingStoreCall, RetryPolicy, StoreCall } from '../utils/retry';
import { LedgerStore, NewStockHistoryEntry } from '../store/ledger-store';

/** Anything history can be appended through: the store itself or an open transaction */
export interface HistorySink {
     appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void>;
}

export function historyEntry(
     type: StockHistoryType,
     quantityChange: number,
     details: string,
     timestamp: Date = new Date()
): NewStockHistoryEntry {
     return { timestamp, type, quantityChange, details };
}

export function sumHistory(entries: StockHistoryEntry[]): number {
     return entries.reduce((total, entry) => total + entry.quantityChange, 0);
}

/**
 * Writes the append-only stock history and checks it against the ledger.
 *
 * Every quantity-affecting write must go through one of the record* methods inside the
 * same transaction as the quantity change, otherwise reconciliation will report a
 * mismatch for the item.
 */
export class AuditLogWriter {
     private readonly call: StoreCall;

     constructor(
          private readonly store: LedgerStore,
          retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
          sleep?: (ms: number) => Promise<void>
     ) {
          this.call = retryingStoreCall(retryPolicy, sleep);
     }

     async recordInitialStock(
          sink: HistorySink,
          item: InventoryItem,
          details = 'Item created in the system.'
     ): Promise<void> {
          await sink.appendHistory(
               item.id,
               historyEntry('INITIAL_STOCK', item.quantity, details, item.createdAt)
          );
     }

     async recordManualAdjustment(
          sink: HistorySink,
          itemId: string,
          quantityChange: number,
          details = 'Item updated manually.'
     ): Promise<void> {
          if (quantityChange === 0) return;
          await sink.appendHistory(
               itemId,
               historyEntry('MANUAL_ADJUSTMENT', quantityChange, details)
          );
     }

     async recordSale(
          sink: HistorySink,
          itemId: string,
          type: Extract<StockHistoryType, 'ORDER_SALE' | 'DIRECT_SALE'>,
          quantitySold: number,
          details: string,
          timestamp: Date
     ): Promise<void> {
          await sink.appendHistory(itemId, historyEntry(type, -quantitySold, details, timestamp));
     }

     async reconcileItem(itemId: string): Promise<ReconciliationReport> {
          const item = await this.call(`get item ${itemId}`, () => this.store.getItem(itemId));
          if (!item) {
               throw new ItemNotFoundError(itemId);
          }
          return this.reconcile(item);
     }

     /** Throws when the item's history does not add up to its quantity */
     async assertItemConsistent(itemId: string): Promise<void> {
          const report = await this.reconcileItem(itemId);
          if (!report.consistent) {
               throw new InvariantViolationError(itemId, report.quantity, report.historyTotal);
          }
     }

     async reconcileAll(): Promise<ReconciliationReport[]> {
          const items = await this.call('list items', () => this.store.listItems());
          const reports: ReconciliationReport[] = [];
          for (const item of items) {
               reports.push(await this.reconcile(item));
          }

          const mismatches = reports.filter((r) => !r.consistent).length;
          logger.info({ itemCount: reports.length, mismatches }, 'Ledger reconciliation finished');
          return reports;
     }

     private async reconcile(item: InventoryItem): Promise<ReconciliationReport> {
          const entries = await this.call(`list history of ${item.id}`, () =>
               this.store.listHistory(item.id)
          );
          const historyTotal = sumHistory(entries);
          const report: ReconciliationReport = {
               itemId: item.id,
               quantity: item.quantity,
               historyTotal,
               entryCount: entries.length,
               consistent: historyTotal === item.quantity,
          };

          if (!report.consistent) {
               logger.error(
                    {
                         errorCode: 'INVARIANT_VIOLATION',
                         itemId: item.id,
                         quantity: item.quantity,
                         historyTotal,
                    },
                    'Ledger quantity does not match stock history'
               );
          }

          return report;
     }
}
