import {
     closePool,
     createLedgerStore,
     MemoryLedgerStore,
     PgLedgerStore,
} from '@stock-ledger/shared/src';

describe('createLedgerStore', () => {
     const originalStore = process.env.LEDGER_STORE;

     afterEach(async () => {
          if (originalStore === undefined) {
               delete process.env.LEDGER_STORE;
          } else {
               process.env.LEDGER_STORE = originalStore;
          }
          await closePool();
     });

     it('should use the in-memory store when configured', () => {
          process.env.LEDGER_STORE = 'memory';
          expect(createLedgerStore()).toBeInstanceOf(MemoryLedgerStore);
     });

     it('should default to PostgreSQL without connecting', () => {
          delete process.env.LEDGER_STORE;
          expect(createLedgerStore()).toBeInstanceOf(PgLedgerStore);
     });

     it('should reject unknown store types', () => {
          process.env.LEDGER_STORE = 'redis';
          expect(() => createLedgerStore()).toThrow(
               "Unknown LEDGER_STORE 'redis', expected 'postgres' or 'memory'"
          );
     });
});
