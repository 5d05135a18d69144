import { randomUUID } from 'crypto';
import { NewSupplier, Supplier } from '../types/inventory.types';
import { InvalidItemError, SupplierNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, retryingStoreCall, RetryPolicy, StoreCall } from '../utils/retry';
import { LedgerStore } from '../store/ledger-store';

export class SupplierService {
     private readonly call: StoreCall;

     constructor(
          private readonly store: LedgerStore,
          retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
          sleep?: (ms: number) => Promise<void>
     ) {
          this.call = retryingStoreCall(retryPolicy, sleep);
     }

     async addSupplier(input: NewSupplier): Promise<Supplier> {
          const name = input.name?.trim();
          if (!name) {
               throw new InvalidItemError('Supplier name is required');
          }

          const supplier: Supplier = {
               id: randomUUID(),
               name,
               contact: input.contact,
               phone: input.phone,
               email: input.email,
               createdAt: new Date(),
          };
          await this.call(`add supplier ${supplier.id}`, () => this.store.addSupplier(supplier));

          logger.info({ supplierId: supplier.id, name }, 'Supplier added');
          return supplier;
     }

     async getSupplier(supplierId: string): Promise<Supplier> {
          const supplier = await this.call(`get supplier ${supplierId}`, () =>
               this.store.getSupplier(supplierId)
          );
          if (!supplier) {
               throw new SupplierNotFoundError(supplierId);
          }
          return supplier;
     }

     listSuppliers(): Promise<Supplier[]> {
          return this.call('list suppliers', () => this.store.listSuppliers());
     }
}
