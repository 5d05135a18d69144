import { logger } from '../utils/logger';
import { LedgerStore } from './ledger-store';
import { MemoryLedgerStore } from './memory-ledger-store';
import { PgLedgerStore } from './pg-ledger-store';

export * from './ledger-store';
export * from './memory-ledger-store';
export * from './pg-ledger-store';

/**
 * Factory function to create the ledger store based on environment
 */
export function createLedgerStore(): LedgerStore {
     const storeType = process.env.LEDGER_STORE || 'postgres';

     if (storeType === 'postgres') {
          logger.info('Using PostgreSQL ledger store');
          return new PgLedgerStore();
     }

     if (storeType === 'memory') {
          logger.warn('Using in-memory ledger store, data is lost on restart');
          return new MemoryLedgerStore();
     }

     throw new Error(`Unknown LEDGER_STORE '${storeType}', expected 'postgres' or 'memory'`);
}
