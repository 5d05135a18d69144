import { LedgerStore } from '@stock-ledger/shared/src/store/ledger-store';
import { AlertEmitter } from '@stock-ledger/shared/src/notifications/alert-emitter';
import { AuditLogWriter } from '@stock-ledger/shared/src/services/audit-log';
import { CartService } from '@stock-ledger/shared/src/services/cart-service';
import { InventoryService } from '@stock-ledger/shared/src/services/inventory-service';
import { OrderService } from '@stock-ledger/shared/src/services/order-service';
import { SettlementEngine } from '@stock-ledger/shared/src/services/settlement-engine';
import { SupplierService } from '@stock-ledger/shared/src/services/supplier-service';
import { RetryPolicy } from '@stock-ledger/shared/src/utils/retry';

// A type alias rather than an interface so it can be passed as Fastify plugin options
export type AppDependencies = {
     store: LedgerStore;
     audit: AuditLogWriter;
     engine: SettlementEngine;
     inventoryService: InventoryService;
     orderService: OrderService;
     supplierService: SupplierService;
     cartService: CartService;
};

export interface DependencyOptions {
     retryPolicy?: RetryPolicy;
     sleep?: (ms: number) => Promise<void>;
}

export function createDependencies(
     store: LedgerStore,
     alertEmitter: AlertEmitter,
     options: DependencyOptions = {}
): AppDependencies {
     const { retryPolicy, sleep } = options;
     const engine = new SettlementEngine(store, alertEmitter, { retryPolicy, sleep });

     return {
          store,
          audit: new AuditLogWriter(store, retryPolicy, sleep),
          engine,
          inventoryService: new InventoryService(store, retryPolicy, sleep),
          orderService: new OrderService(store, engine, retryPolicy, sleep),
          supplierService: new SupplierService(store, retryPolicy, sleep),
          cartService: new CartService(store, retryPolicy, sleep),
     };
}
