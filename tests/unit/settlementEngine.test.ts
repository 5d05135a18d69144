import {
     generateSaleId,
     lowStockAlerts,
     SettlementEngine,
} from '@stock-ledger/shared/src/services/settlement-engine';
import { MemoryLedgerStore } from '@stock-ledger/shared/src/store/memory-ledger-store';
import { TransientStoreError } from '@stock-ledger/shared/src/utils/errors';
import type { SettlementRequest } from '@stock-ledger/shared/src/types/inventory.types';
import {
     createTestOrder,
     FailingAlertEmitter,
     FAST_RETRY,
     getQuantity,
     makeItem,
     noSleep,
     RecordingAlertEmitter,
     seedItem,
     TEST_CREATED_AT,
} from '../helpers/testUtils';

const SETTLED_AT = new Date('2024-05-03T15:30:45.000Z');

function saleRequest(
     reference: string,
     lines: SettlementRequest['lines'],
     requestId = `req-${reference}`
): SettlementRequest {
     return { requestId, kind: 'DIRECT_SALE', reference, lines };
}

describe('SettlementEngine (Unit)', () => {
     let store: MemoryLedgerStore;
     let emitter: RecordingAlertEmitter;
     let engine: SettlementEngine;

     beforeEach(() => {
          store = new MemoryLedgerStore();
          emitter = new RecordingAlertEmitter();
          engine = new SettlementEngine(store, emitter, {
               retryPolicy: FAST_RETRY,
               clock: () => SETTLED_AT,
               sleep: noSleep,
          });
     });

     describe('Request validation', () => {
          it('should reject a request without lines', async () => {
               const result = await engine.settle(saleRequest('S-1', []));

               expect(result).toEqual({
                    success: false,
                    message: 'Settlement must have at least one line',
                    alerts: [],
                    outcome: 'REJECTED',
                    failure: { code: 'INVALID_QUANTITY', statusCode: 400 },
               });
          });

          it('should reject non-positive and fractional quantities', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const zero = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 0 }]));
               const fraction = await engine.settle(
                    saleRequest('S-2', [{ itemId: 'A', quantity: 1.5 }])
               );

               expect(zero.message).toBe('Quantity must be a positive integer for item A');
               expect(fraction.failure?.code).toBe('INVALID_QUANTITY');
               expect(await getQuantity(store, 'A')).toBe(10);
          });

          it('should reject an item listed twice', async () => {
               const result = await engine.settle(
                    saleRequest('S-1', [
                         { itemId: 'A', quantity: 1 },
                         { itemId: 'A', quantity: 2 },
                    ])
               );

               expect(result.outcome).toBe('REJECTED');
               expect(result.message).toBe('Item A appears more than once');
               expect(result.failure?.code).toBe('INVALID_ITEM');
          });
     });

     describe('Direct sales', () => {
          it('should decrement stock, write history and record the sale', async () => {
               await seedItem(store, { id: 'A', quantity: 10, salePrice: 2.5 });
               await seedItem(store, { id: 'B', quantity: 4, salePrice: 1 });

               const result = await engine.settle(
                    saleRequest('S-1', [
                         { itemId: 'A', quantity: 3 },
                         { itemId: 'B', quantity: 4 },
                    ])
               );

               expect(result).toEqual({
                    success: true,
                    message: "Sale 'S-1' processed and stock updated.",
                    alerts: [],
                    outcome: 'COMMITTED',
               });
               expect(await getQuantity(store, 'A')).toBe(7);
               expect(await getQuantity(store, 'B')).toBe(0);

               const history = await store.listHistory('A');
               expect(history[1]).toEqual({
                    id: '3',
                    itemId: 'A',
                    timestamp: SETTLED_AT,
                    type: 'DIRECT_SALE',
                    quantityChange: -3,
                    details: 'Sale ID: S-1 (request req-S-1)',
               });

               const sale = await store.getSale('S-1');
               expect(sale?.total).toBe(11.5);
               expect(sale?.lines.map((l) => [l.itemId, l.quantity, l.salePrice])).toEqual([
                    ['A', 3, 2.5],
                    ['B', 4, 1],
               ]);
          });

          it('should notify the outcome with the sale total', async () => {
               await seedItem(store, { id: 'A', quantity: 10, salePrice: 2.5 });

               await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 2 }]));

               expect(emitter.messages).toEqual(['Direct sale processed: S-1 for a total of $5.00']);
          });

          it('should reject a sale id that was already recorded', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               const request = saleRequest('S-1', [{ itemId: 'A', quantity: 2 }]);

               await engine.settle(request);
               const replay = await engine.settle(request);

               expect(replay.outcome).toBe('REJECTED');
               expect(replay.failure).toEqual({ code: 'SALE_ALREADY_RECORDED', statusCode: 409 });
               expect(await getQuantity(store, 'A')).toBe(8);
          });

          it('should name the missing item', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const result = await engine.settle(
                    saleRequest('S-1', [
                         { itemId: 'A', quantity: 1 },
                         { itemId: 'Z', quantity: 1 },
                    ])
               );

               expect(result.message).toBe('Inventory item Z not found');
               expect(result.failure).toEqual({ code: 'ITEM_NOT_FOUND', statusCode: 404 });
               expect(await getQuantity(store, 'A')).toBe(10);
          });

          it('should generate a sale id when none is given', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });

               const result = await engine.processDirectSale([{ itemId: 'A', quantity: 1 }]);

               expect(result.success).toBe(true);
               expect(result.saleId).toMatch(/^SALE-20240503-153045-[0-9a-f]{4}$/);
               expect(await store.getSale(result.saleId)).not.toBeNull();
          });

          it('should reject invalid lines before building a request', async () => {
               const result = await engine.processDirectSale([], 'S-9');

               expect(result.saleId).toBe('S-9');
               expect(result.outcome).toBe('REJECTED');
               expect(result.failure?.code).toBe('INVALID_QUANTITY');
          });
     });

     describe('Order completion', () => {
          it('should settle the ingredients and complete the order', async () => {
               const item = await seedItem(store, { id: 'A', quantity: 10 });
               await createTestOrder(store, 'O-1', [{ item, quantity: 4 }], 'Table 4');

               const result = await engine.completeOrder('O-1');

               expect(result).toEqual({
                    success: true,
                    message: "Order 'Table 4' completed.",
                    alerts: [],
                    outcome: 'COMMITTED',
               });
               expect(await getQuantity(store, 'A')).toBe(6);

               const order = await store.getOrder('O-1');
               expect(order?.status).toBe('completed');
               expect(order?.completedAt).toEqual(SETTLED_AT);

               const history = await store.listHistory('A');
               expect(history[1].type).toBe('ORDER_SALE');
               expect(history[1].quantityChange).toBe(-4);
               expect(history[1].details).toMatch(/^Order ID: O-1 \(request .+\)$/);
               expect(emitter.messages).toEqual(['Order completed: Table 4']);
          });

          it('should reject a missing order', async () => {
               const result = await engine.completeOrder('O-404');

               expect(result.outcome).toBe('REJECTED');
               expect(result.message).toBe('Order O-404 not found');
               expect(result.failure?.statusCode).toBe(404);
          });

          it('should reject completing the same order twice without decrementing again', async () => {
               const item = await seedItem(store, { id: 'A', quantity: 10 });
               await createTestOrder(store, 'O-1', [{ item, quantity: 4 }]);

               await engine.completeOrder('O-1');
               const replay = await engine.completeOrder('O-1');

               expect(replay.outcome).toBe('REJECTED');
               expect(replay.message).toBe('Order O-1 has already been completed');
               expect(await getQuantity(store, 'A')).toBe(6);
               expect(await store.listHistory('A')).toHaveLength(2);
          });
     });

     describe('Alerts', () => {
          it('should compute alerts inside (0, threshold]', () => {
               const item = makeItem({ id: 'A', name: 'Milk', quantity: 6, minStockAlert: 5 });

               expect(lowStockAlerts([{ item, quantity: 1, newQuantity: 5 }])).toEqual([
                    "'Milk' has reached the minimum stock threshold (5/5).",
               ]);
               expect(lowStockAlerts([{ item, quantity: 6, newQuantity: 0 }])).toEqual([]);
               expect(lowStockAlerts([{ item, quantity: 0, newQuantity: 6 }])).toEqual([]);
          });

          it('should ignore items without a threshold or with a zero threshold', () => {
               const none = makeItem({ id: 'A', quantity: 3 });
               const zero = makeItem({ id: 'B', quantity: 3, minStockAlert: 0 });

               expect(
                    lowStockAlerts([
                         { item: none, quantity: 1, newQuantity: 2 },
                         { item: zero, quantity: 1, newQuantity: 2 },
                    ])
               ).toEqual([]);
          });

          it('should forward each alert to the emitter after commit', async () => {
               await seedItem(store, { id: 'A', name: 'Milk', quantity: 6, minStockAlert: 5 });

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 1 }]));

               expect(result.alerts).toEqual([
                    "'Milk' has reached the minimum stock threshold (5/5).",
               ]);
               expect(emitter.messages).toEqual([
                    'Direct sale processed: S-1 for a total of $2.00',
                    "LOW STOCK ALERT: 'Milk' has reached the minimum stock threshold (5/5).",
               ]);
          });

          it('should not let a failing emitter change the result', async () => {
               const failing = new FailingAlertEmitter();
               engine = new SettlementEngine(store, failing, { retryPolicy: FAST_RETRY });
               await seedItem(store, { id: 'A', quantity: 6, minStockAlert: 5 });

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 1 }]));

               expect(result.success).toBe(true);
               expect(result.alerts).toHaveLength(1);
               expect(failing.calls).toBe(2);
               expect(await getQuantity(store, 'A')).toBe(5);
          });

          it('should return the committed result while the emitter never answers', async () => {
               const stalled = { notify: jest.fn(() => new Promise<void>(() => {})) };
               engine = new SettlementEngine(store, stalled, { retryPolicy: FAST_RETRY });
               await seedItem(store, { id: 'A', quantity: 6, minStockAlert: 5 });

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 1 }]));

               expect(result.outcome).toBe('COMMITTED');
               expect(stalled.notify).toHaveBeenCalledTimes(2);
               expect(await getQuantity(store, 'A')).toBe(5);
          });
     });

     describe('Store failures', () => {
          it('should retry transient failures and then commit once', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               const spy = jest
                    .spyOn(store, 'runTransaction')
                    .mockRejectedValueOnce(new TransientStoreError('connection reset'));

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 2 }]));

               expect(result.outcome).toBe('COMMITTED');
               expect(spy).toHaveBeenCalledTimes(2);
               expect(await getQuantity(store, 'A')).toBe(8);
               expect(await store.listHistory('A')).toHaveLength(2);
          });

          it('should report the store as unavailable once retries run out', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               const spy = jest
                    .spyOn(store, 'runTransaction')
                    .mockRejectedValue(new TransientStoreError('connection reset'));

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 2 }]));

               expect(result).toEqual({
                    success: false,
                    message: 'Could not complete the settlement, please try again.',
                    alerts: [],
                    outcome: 'UNAVAILABLE',
                    failure: { code: 'STORE_UNAVAILABLE', statusCode: 503 },
               });
               expect(spy).toHaveBeenCalledTimes(3);
               expect(emitter.messages).toEqual([]);
          });

          it('should not retry unexpected errors', async () => {
               await seedItem(store, { id: 'A', quantity: 10 });
               const spy = jest
                    .spyOn(store, 'runTransaction')
                    .mockRejectedValue(new Error('disk on fire'));

               const result = await engine.settle(saleRequest('S-1', [{ itemId: 'A', quantity: 2 }]));

               expect(result.outcome).toBe('ERROR');
               expect(result.failure).toEqual({ code: 'INTERNAL_ERROR', statusCode: 500 });
               expect(spy).toHaveBeenCalledTimes(1);
          });
     });

     it('should format generated sale ids from the UTC clock', () => {
          expect(generateSaleId(TEST_CREATED_AT)).toMatch(/^SALE-20240501-090000-[0-9a-f]{4}$/);
     });
});
