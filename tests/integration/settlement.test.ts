import { AuditLogWriter } from '@stock-ledger/shared/src/services/audit-log';
import { InventoryService } from '@stock-ledger/shared/src/services/inventory-service';
import { SettlementEngine } from '@stock-ledger/shared/src/services/settlement-engine';
import { MemoryLedgerStore } from '@stock-ledger/shared/src/store/memory-ledger-store';
import {
     createTestOrder,
     createTestStore,
     FAST_RETRY,
     getQuantity,
     noSleep,
     RecordingAlertEmitter,
     seedItem,
} from '../helpers/testUtils';

describe('Settlement engine - ledger guarantees', () => {
     let store: MemoryLedgerStore;
     let emitter: RecordingAlertEmitter;
     let engine: SettlementEngine;
     let audit: AuditLogWriter;

     beforeEach(() => {
          // Store latency lets concurrent transactions overlap between read and commit
          store = createTestStore(5);
          emitter = new RecordingAlertEmitter();
          engine = new SettlementEngine(store, emitter, { retryPolicy: FAST_RETRY, sleep: noSleep });
          audit = new AuditLogWriter(store);
     });

     describe('Concurrent settlements', () => {
          it('should let only one of two overlapping sales take the last units', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const results = await Promise.all([
                    engine.processDirectSale([{ itemId: 'A', quantity: 6 }], 'SALE-1'),
                    engine.processDirectSale([{ itemId: 'A', quantity: 6 }], 'SALE-2'),
               ]);

               expect(results.filter((r) => r.outcome === 'COMMITTED')).toHaveLength(1);
               const rejected = results.filter((r) => r.outcome === 'REJECTED');
               expect(rejected).toHaveLength(1);
               expect(rejected[0].failure?.code).toBe('INSUFFICIENT_STOCK');
               expect(await getQuantity(store, 'A')).toBe(4);
               expect((await audit.reconcileItem('A')).consistent).toBe(true);
          });

          it('should commit both sales when stock covers them', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const results = await Promise.all([
                    engine.processDirectSale([{ itemId: 'A', quantity: 3 }], 'SALE-1'),
                    engine.processDirectSale([{ itemId: 'A', quantity: 3 }], 'SALE-2'),
               ]);

               expect(results.map((r) => r.outcome)).toEqual(['COMMITTED', 'COMMITTED']);
               expect(await getQuantity(store, 'A')).toBe(4);
               expect(await store.listHistory('A')).toHaveLength(3);
          });

          it('should never oversell under a burst of sales', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const results = await Promise.all(
                    [1, 2, 3, 4, 5].map((n) =>
                         engine.processDirectSale([{ itemId: 'A', quantity: 5 }], `SALE-${n}`)
                    )
               );

               expect(results.filter((r) => r.outcome === 'COMMITTED')).toHaveLength(2);
               expect(results.filter((r) => r.outcome === 'REJECTED')).toHaveLength(3);
               expect(await getQuantity(store, 'A')).toBe(0);
               expect((await audit.reconcileItem('A')).consistent).toBe(true);
          });

          it('should complete an order only once when completions race', async () => {
               const item = await seedItem(store, { id: 'A', quantity: 10 });
               await createTestOrder(store, 'ORDER-1', [{ item, quantity: 4 }]);

               const results = await Promise.all([
                    engine.completeOrder('ORDER-1'),
                    engine.completeOrder('ORDER-1'),
               ]);

               expect(results.filter((r) => r.outcome === 'COMMITTED')).toHaveLength(1);
               const rejected = results.find((r) => r.outcome === 'REJECTED');
               expect(rejected?.failure?.code).toBe('ORDER_ALREADY_SETTLED');
               expect(await getQuantity(store, 'A')).toBe(6);
          });

          it('should keep history consistent when a manual edit races a sale', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               const inventory = new InventoryService(store, FAST_RETRY);

               const [, sale] = await Promise.all([
                    inventory.updateItem('A', { quantity: 20 }),
                    engine.processDirectSale([{ itemId: 'A', quantity: 3 }], 'SALE-1'),
               ]);

               expect(sale.outcome).toBe('COMMITTED');
               expect([17, 20]).toContain(await getQuantity(store, 'A'));
               expect((await audit.reconcileItem('A')).consistent).toBe(true);
          });
     });

     describe('Atomicity', () => {
          it('should leave every item untouched when one line is short', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               await seedItem(store, { id: 'B', name: 'Bread', quantity: 1 });

               const result = await engine.processDirectSale(
                    [
                         { itemId: 'A', quantity: 2 },
                         { itemId: 'B', quantity: 5 },
                    ],
                    'SALE-1'
               );

               expect(result).toEqual({
                    success: false,
                    message: "Insufficient stock for 'Bread' (B): requested 5, available 1",
                    alerts: [],
                    outcome: 'REJECTED',
                    failure: { code: 'INSUFFICIENT_STOCK', statusCode: 409 },
                    saleId: 'SALE-1',
               });
               expect(await getQuantity(store, 'A')).toBe(10);
               expect(await getQuantity(store, 'B')).toBe(1);
               expect(await store.listHistory('A')).toHaveLength(1);
               expect(await store.getSale('SALE-1')).toBeNull();
               expect(emitter.messages).toEqual([]);
          });

          it('should leave the order processing when an ingredient is missing', async () => {
               const item = await seedItem(store, { id: 'A', quantity: 10 });
               await createTestOrder(store, 'ORDER-1', [
                    { item, quantity: 2 },
                    { item: { ...item, id: 'GONE' }, quantity: 1 },
               ]);

               const result = await engine.completeOrder('ORDER-1');

               expect(result.failure?.code).toBe('ITEM_NOT_FOUND');
               expect((await store.getOrder('ORDER-1'))?.status).toBe('processing');
               expect(await getQuantity(store, 'A')).toBe(10);
          });
     });

     describe('Idempotent replay', () => {
          it('should apply a sale id only once', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const first = await engine.processDirectSale([{ itemId: 'A', quantity: 2 }], 'SALE-1');
               const replay = await engine.processDirectSale(
                    [{ itemId: 'A', quantity: 2 }],
                    'SALE-1'
               );

               expect(first.outcome).toBe('COMMITTED');
               expect(replay.outcome).toBe('REJECTED');
               expect(replay.failure?.code).toBe('SALE_ALREADY_RECORDED');
               expect(await getQuantity(store, 'A')).toBe(8);
          });

          it('should reject completing an order twice', async () => {
               const item = await seedItem(store, { id: 'A', quantity: 10 });
               await createTestOrder(store, 'ORDER-1', [{ item, quantity: 3 }]);

               await engine.completeOrder('ORDER-1');
               const replay = await engine.completeOrder('ORDER-1');

               expect(replay.failure).toEqual({ code: 'ORDER_ALREADY_SETTLED', statusCode: 409 });
               expect(await getQuantity(store, 'A')).toBe(7);
          });
     });

     describe('Low-stock alerts', () => {
          it('should alert once when a sale crosses the threshold', async () => {
               await seedItem(store, { id: 'A', name: 'Oat Milk', quantity: 6, minStockAlert: 5 });

               const result = await engine.processDirectSale([{ itemId: 'A', quantity: 1 }], 'SALE-1');

               expect(result.alerts).toEqual([
                    "'Oat Milk' has reached the minimum stock threshold (5/5).",
               ]);
               expect(emitter.messages).toEqual([
                    'Direct sale processed: SALE-1 for a total of $2.00',
                    "LOW STOCK ALERT: 'Oat Milk' has reached the minimum stock threshold (5/5).",
               ]);
          });

          it('should not alert on a sell-out', async () => {
               await seedItem(store, { id: 'A', quantity: 6, minStockAlert: 5 });

               const result = await engine.processDirectSale([{ itemId: 'A', quantity: 6 }], 'SALE-1');

               expect(result.outcome).toBe('COMMITTED');
               expect(result.alerts).toEqual([]);
               expect(await getQuantity(store, 'A')).toBe(0);
          });
     });

     it('should sell down to the threshold, then refuse an oversized sale', async () => {
          await seedItem(store, { id: 'A', name: 'Croissant', quantity: 10, minStockAlert: 3 });

          const first = await engine.processDirectSale([{ itemId: 'A', quantity: 8 }], 'SALE-1');
          expect(first.success).toBe(true);
          expect(first.message).toBe("Sale 'SALE-1' processed and stock updated.");
          expect(first.alerts).toEqual([
               "'Croissant' has reached the minimum stock threshold (2/3).",
          ]);
          expect(await getQuantity(store, 'A')).toBe(2);

          const second = await engine.processDirectSale([{ itemId: 'A', quantity: 5 }], 'SALE-2');
          expect(second.success).toBe(false);
          expect(second.failure?.code).toBe('INSUFFICIENT_STOCK');
          expect(await getQuantity(store, 'A')).toBe(2);
          expect(await store.listHistory('A')).toHaveLength(2);
     });

     it('should reconcile every item after a mix of operations', async () => {
          const inventory = new InventoryService(store, FAST_RETRY);
          await inventory.registerItem({ id: 'A', name: 'Tea', quantity: 30, salePrice: 3 });
          const b = await inventory.registerItem({ id: 'B', name: 'Honey', quantity: 12 });
          await inventory.updateItem('A', { quantity: 25 });
          await engine.processDirectSale(
               [
                    { itemId: 'A', quantity: 4 },
                    { itemId: 'B', quantity: 2 },
               ],
               'SALE-1'
          );
          await createTestOrder(store, 'ORDER-1', [{ item: b, quantity: 5 }]);
          await engine.completeOrder('ORDER-1');
          await engine.processDirectSale([{ itemId: 'B', quantity: 50 }], 'SALE-2');

          const reports = await audit.reconcileAll();

          expect(reports.map((r) => [r.itemId, r.quantity, r.consistent])).toEqual([
               ['A', 21, true],
               ['B', 5, true],
          ]);
     });
});
