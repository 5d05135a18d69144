import { randomUUID } from 'crypto';
import {
     CreateOrderRequest,
     Order,
     OrderStatus,
     PricedLine,
     SettlementResult,
} from '../types/inventory.types';
import {
     InsufficientStockError,
     ItemNotFoundError,
     OrderNotCancellableError,
     OrderNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { linesTotal } from '../utils/money';
import { DEFAULT_RETRY_POLICY, retryingStoreCall, RetryPolicy, StoreCall } from '../utils/retry';
import { LedgerStore } from '../store/ledger-store';
import { validateSettlementLines } from './cart-service';
import { SettlementEngine } from './settlement-engine';

/**
 * Order lifecycle: processing orders are created with a price snapshot, then either
 * completed through the settlement engine or cancelled.
 */
export class OrderService {
     private readonly call: StoreCall;

     constructor(
          private readonly store: LedgerStore,
          private readonly engine: SettlementEngine,
          retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
          sleep?: (ms: number) => Promise<void>
     ) {
          this.call = retryingStoreCall(retryPolicy, sleep);
     }

     async createOrder(request: CreateOrderRequest): Promise<Order> {
          validateSettlementLines(request.lines);

          // Advisory check only; stock is re-validated when the order is completed
          const ingredients: PricedLine[] = [];
          for (const line of request.lines) {
               const item = await this.call(`get item ${line.itemId}`, () =>
                    this.store.getItem(line.itemId)
               );
               if (!item) {
                    throw new ItemNotFoundError(line.itemId);
               }
               if (item.quantity < line.quantity) {
                    throw new InsufficientStockError(
                         item.id,
                         item.name,
                         line.quantity,
                         item.quantity
                    );
               }
               ingredients.push({
                    itemId: item.id,
                    name: item.name,
                    quantity: line.quantity,
                    purchasePrice: item.purchasePrice,
                    salePrice: item.salePrice,
               });
          }

          const title =
               request.title?.trim() ||
               `Order #${(await this.call('count orders', () => this.store.countOrders())) + 1}`;

          const order: Order = {
               id: randomUUID(),
               title,
               price: linesTotal(ingredients),
               ingredients,
               status: 'processing',
               createdAt: new Date(),
          };
          await this.call(`create order ${order.id}`, () => this.store.createOrder(order));

          logger.info({ orderId: order.id, title, price: order.price }, 'Order created');
          return order;
     }

     completeOrder(orderId: string): Promise<SettlementResult> {
          return this.engine.completeOrder(orderId);
     }

     async cancelOrder(orderId: string): Promise<void> {
          const order = await this.call(`get order ${orderId}`, () => this.store.getOrder(orderId));
          if (!order) {
               throw new OrderNotFoundError(orderId);
          }

          const deleted =
               order.status === 'processing' &&
               (await this.call(`cancel order ${orderId}`, () =>
                    this.store.deleteProcessingOrder(orderId)
               ));
          if (!deleted) {
               throw new OrderNotCancellableError(orderId);
          }

          logger.info({ orderId, title: order.title }, 'Order cancelled');
     }

     async getOrder(orderId: string): Promise<Order> {
          const order = await this.call(`get order ${orderId}`, () => this.store.getOrder(orderId));
          if (!order) {
               throw new OrderNotFoundError(orderId);
          }
          return order;
     }

     /** Newest first */
     listOrders(status?: OrderStatus): Promise<Order[]> {
          return this.call('list orders', () => this.store.listOrders(status));
     }

     /** Orders completed in [from, to) */
     listCompletedOrders(from: Date, to: Date): Promise<Order[]> {
          return this.call('list completed orders', () =>
               this.store.listCompletedOrders(from, to)
          );
     }
}
