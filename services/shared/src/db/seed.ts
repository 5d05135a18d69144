import { LedgerStore } from '../store/ledger-store';
import { PgLedgerStore } from '../store/pg-ledger-store';
import { AuditLogWriter } from '../services/audit-log';
import { InventoryItem, Supplier } from '../types/inventory.types';
import { logger } from '../utils/logger';

const SEED_SUPPLIERS: Array<Omit<Supplier, 'createdAt'>> = [
     { id: 'SUP-ROASTERS', name: 'Hillside Roasters', contact: 'Marta Quinn', phone: '555-0101' },
     { id: 'SUP-DAIRY', name: 'Valley Dairy Co.', email: 'orders@valley-dairy.test' },
];

const SEED_ITEMS: Array<
     Pick<InventoryItem, 'id' | 'name' | 'quantity' | 'purchasePrice' | 'salePrice'> & {
          minStockAlert?: number;
          supplierId?: string;
     }
> = [
     {
          id: '7790001000011',
          name: 'Espresso Beans 1kg',
          quantity: 24,
          purchasePrice: 14.5,
          salePrice: 22,
          minStockAlert: 5,
          supplierId: 'SUP-ROASTERS',
     },
     {
          id: '7790001000028',
          name: 'Whole Milk 1L',
          quantity: 60,
          purchasePrice: 0.9,
          salePrice: 1.6,
          minStockAlert: 12,
          supplierId: 'SUP-DAIRY',
     },
     {
          id: '7790001000035',
          name: 'Paper Cups 12oz (50)',
          quantity: 40,
          purchasePrice: 3.2,
          salePrice: 5,
     },
     {
          id: '7790001000042',
          name: 'Vanilla Syrup 750ml',
          quantity: 8,
          purchasePrice: 6.75,
          salePrice: 11.25,
          minStockAlert: 3,
     },
];

/**
 * Import sample suppliers and items, each item with the INITIAL_STOCK entry that makes
 * its history reconcile. Items that already exist are left alone.
 */
async function seedDatabase(store: LedgerStore = new PgLedgerStore()): Promise<number> {
     const audit = new AuditLogWriter(store);
     let imported = 0;

     try {
          logger.info('Seeding ledger with sample data');

          const now = new Date();
          const supplierNames = new Map<string, string>();
          for (const supplier of SEED_SUPPLIERS) {
               const existing = await store.getSupplier(supplier.id);
               if (!existing) {
                    await store.addSupplier({ ...supplier, createdAt: now });
               }
               supplierNames.set(supplier.id, existing?.name ?? supplier.name);
          }

          for (const seed of SEED_ITEMS) {
               const item: InventoryItem = {
                    ...seed,
                    supplierName: seed.supplierId ? supplierNames.get(seed.supplierId) : undefined,
                    version: 1,
                    createdAt: now,
                    updatedAt: now,
               };

               // Item and its INITIAL_STOCK entry land together or not at all
               const created = await store.runTransaction(async (tx) => {
                    if (await tx.getItem(item.id)) {
                         return false;
                    }
                    await tx.createItem(item);
                    await audit.recordInitialStock(tx, item, 'Imported from seed data.');
                    return true;
               });
               if (!created) {
                    logger.debug({ itemId: item.id }, 'Item already present, skipping');
                    continue;
               }

               await audit.assertItemConsistent(item.id);
               imported += 1;
          }

          logger.info({ imported }, 'Database seeding completed successfully');
          return imported;
     } catch (error) {
          logger.error({ err: error }, 'Seeding failed');
          throw error;
     } finally {
          await store.close();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.error({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase, SEED_ITEMS };
