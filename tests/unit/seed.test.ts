import { seedDatabase, SEED_ITEMS } from '@stock-ledger/shared/src/db/seed';
import { AuditLogWriter } from '@stock-ledger/shared/src/services/audit-log';
import { MemoryLedgerStore } from '@stock-ledger/shared/src/store/memory-ledger-store';
import type { LedgerTransaction } from '@stock-ledger/shared/src/store/ledger-store';
import { seedItem } from '../helpers/testUtils';

/** Fails the nth transaction after its callback has buffered every write */
class FailingCommitStore extends MemoryLedgerStore {
     private transactions = 0;

     constructor(private readonly failOn: number) {
          super();
     }

     runTransaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
          this.transactions += 1;
          if (this.transactions !== this.failOn) {
               return super.runTransaction(fn);
          }
          return super.runTransaction(async (tx) => {
               await fn(tx);
               throw new Error('history write failed');
          });
     }
}

describe('seedDatabase', () => {
     it('should import every item with reconciling history and close the store', async () => {
          const store = new MemoryLedgerStore();
          const close = jest.spyOn(store, 'close');

          const imported = await seedDatabase(store);

          expect(imported).toBe(SEED_ITEMS.length);
          expect(close).toHaveBeenCalledTimes(1);
          expect((await store.listSuppliers()).map((s) => s.id)).toEqual([
               'SUP-ROASTERS',
               'SUP-DAIRY',
          ]);

          const espresso = await store.getItem('7790001000011');
          expect(espresso?.supplierName).toBe('Hillside Roasters');
          const [entry] = await store.listHistory('7790001000011');
          expect(entry.type).toBe('INITIAL_STOCK');
          expect(entry.details).toBe('Imported from seed data.');

          const reports = await new AuditLogWriter(store).reconcileAll();
          expect(reports.every((r) => r.consistent)).toBe(true);
     });

     it('should leave existing items alone', async () => {
          const store = new MemoryLedgerStore();
          await seedItem(store, { id: '7790001000011', name: 'House Blend', quantity: 3 });

          const imported = await seedDatabase(store);

          expect(imported).toBe(SEED_ITEMS.length - 1);
          expect((await store.getItem('7790001000011'))?.name).toBe('House Blend');
          expect(await store.listHistory('7790001000011')).toHaveLength(1);
     });

     it('should not leave an item without its history when an import fails', async () => {
          const store = new FailingCommitStore(2);

          await expect(seedDatabase(store)).rejects.toThrow('history write failed');

          expect(await store.getItem(SEED_ITEMS[0].id)).not.toBeNull();
          expect(await store.getItem(SEED_ITEMS[1].id)).toBeNull();
          expect(await store.listHistory(SEED_ITEMS[1].id)).toEqual([]);
          const reports = await new AuditLogWriter(store).reconcileAll();
          expect(reports.map((r) => [r.itemId, r.consistent])).toEqual([
               [SEED_ITEMS[0].id, true],
          ]);
     });
});
