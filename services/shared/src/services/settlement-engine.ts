import {
     DirectSale,
     InventoryItem,
     Order,
     PricedLine,
     SettlementLine,
     SettlementRequest,
     SettlementResult,
} from '../types/inventory.types';
import {
     DomainError,
     InsufficientStockError,
     ItemNotFoundError,
     OrderAlreadySettledError,
     OrderNotFoundError,
     RetryExhaustedError,
     SaleAlreadyRecordedError,
} from '../utils/errors';
import { createChildLogger, Logger } from '../utils/logger';
import { formatCurrency, linesTotal } from '../utils/money';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry';
import { LedgerStore, LedgerTransaction } from '../store/ledger-store';
import { AlertEmitter, notifyAll } from '../notifications/alert-emitter';
import { AuditLogWriter } from './audit-log';
import { buildSettlementRequest, validateSettlementLines } from './cart-service';

export interface SettledLine {
     item: InventoryItem;
     quantity: number;
     newQuantity: number;
}

export interface SettlementCommit {
     lines: SettledLine[];
     order?: Order;
     sale?: DirectSale;
}

export interface SettlementEngineOptions {
     retryPolicy?: RetryPolicy;
     clock?: () => Date;
     sleep?: (ms: number) => Promise<void>;
}

function pricedLine(item: InventoryItem, quantity: number): PricedLine {
     return {
          itemId: item.id,
          name: item.name,
          quantity,
          purchasePrice: item.purchasePrice,
          salePrice: item.salePrice,
     };
}

/**
 * Validate and apply one settlement inside an open transaction.
 *
 * All reads happen before the first write, and nothing is written unless every line
 * passes, so a rejection leaves the transaction without effects to roll back.
 */
export async function applySettlement(
     tx: LedgerTransaction,
     request: SettlementRequest,
     audit: AuditLogWriter,
     settledAt: Date
): Promise<SettlementCommit> {
     const { kind, reference, requestId, lines } = request;

     let order: Order | undefined;
     if (kind === 'ORDER_COMPLETION') {
          const found = await tx.getOrder(reference);
          if (!found) {
               throw new OrderNotFoundError(reference);
          }
          if (found.status !== 'processing') {
               throw new OrderAlreadySettledError(reference);
          }
          order = found;
     } else if (await tx.getSale(reference)) {
          throw new SaleAlreadyRecordedError(reference);
     }

     const items = await tx.getItems(lines.map((line) => line.itemId));

     const settled: SettledLine[] = [];
     for (const line of lines) {
          const item = items.get(line.itemId);
          if (!item) {
               throw new ItemNotFoundError(line.itemId);
          }

          const newQuantity = item.quantity - line.quantity;
          if (newQuantity < 0) {
               throw new InsufficientStockError(item.id, item.name, line.quantity, item.quantity);
          }

          settled.push({ item, quantity: line.quantity, newQuantity });
     }

     const historyType = kind === 'ORDER_COMPLETION' ? 'ORDER_SALE' : 'DIRECT_SALE';
     const details =
          kind === 'ORDER_COMPLETION'
               ? `Order ID: ${reference} (request ${requestId})`
               : `Sale ID: ${reference} (request ${requestId})`;

     for (const { item, quantity, newQuantity } of settled) {
          await tx.updateItem(item, { quantity: newQuantity });
          await audit.recordSale(tx, item.id, historyType, quantity, details, settledAt);
     }

     if (order) {
          await tx.completeOrder(order, settledAt);
          return {
               lines: settled,
               order: { ...order, status: 'completed', completedAt: settledAt },
          };
     }

     const saleLines = settled.map(({ item, quantity }) => pricedLine(item, quantity));
     const sale: DirectSale = {
          id: reference,
          requestId,
          lines: saleLines,
          total: linesTotal(saleLines),
          createdAt: settledAt,
     };
     await tx.recordSale(sale);
     return { lines: settled, sale };
}

/**
 * One alert per item whose new quantity sits in (0, minStockAlert]. Items without a
 * threshold, or with a zero threshold, never alert; neither does a sell-out to zero.
 */
export function lowStockAlerts(lines: SettledLine[]): string[] {
     const alerts: string[] = [];
     for (const { item, newQuantity } of lines) {
          const threshold = item.minStockAlert;
          if (threshold && newQuantity > 0 && newQuantity <= threshold) {
               alerts.push(
                    `'${item.name}' has reached the minimum stock threshold (${newQuantity}/${threshold}).`
               );
          }
     }
     return alerts;
}

function pad(value: number): string {
     return String(value).padStart(2, '0');
}

export function generateSaleId(now: Date = new Date()): string {
     const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
     const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
     const suffix = Math.floor(Math.random() * 0x10000)
          .toString(16)
          .padStart(4, '0');
     return `SALE-${date}-${time}-${suffix}`;
}

export class SettlementEngine {
     private readonly audit: AuditLogWriter;
     private readonly retryPolicy: RetryPolicy;
     private readonly clock: () => Date;
     private readonly sleep?: (ms: number) => Promise<void>;

     constructor(
          private readonly store: LedgerStore,
          private readonly alertEmitter: AlertEmitter,
          options: SettlementEngineOptions = {}
     ) {
          this.audit = new AuditLogWriter(store);
          this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
          this.clock = options.clock ?? (() => new Date());
          this.sleep = options.sleep;
     }

     /**
      * Apply a settlement atomically. Never throws: business rejections, exhausted
      * retries and unexpected failures all come back as an unsuccessful result.
      */
     async settle(request: SettlementRequest): Promise<SettlementResult> {
          const log = createChildLogger({
               requestId: request.requestId,
               kind: request.kind,
               reference: request.reference,
          });

          log.info({ lineCount: request.lines?.length ?? 0 }, 'Settling request');

          let commit: SettlementCommit;
          try {
               validateSettlementLines(request.lines);
               commit = await withRetry(
                    () =>
                         this.store.runTransaction((tx) =>
                              applySettlement(tx, request, this.audit, this.clock())
                         ),
                    this.retryPolicy,
                    { operation: `settle ${request.reference}`, logger: log, sleep: this.sleep }
               );
          } catch (error) {
               return this.failure(error, log);
          }

          const alerts = lowStockAlerts(commit.lines);
          const message = commit.order
               ? `Order '${commit.order.title}' completed.`
               : `Sale '${request.reference}' processed and stock updated.`;

          log.info(
               {
                    items: commit.lines.map((l) => ({
                         itemId: l.item.id,
                         newQuantity: l.newQuantity,
                    })),
                    alertCount: alerts.length,
               },
               'Settlement committed'
          );

          const notice = commit.order
               ? `Order completed: ${commit.order.title}`
               : `Direct sale processed: ${request.reference} for a total of ${formatCurrency(
                      commit.sale?.total ?? 0
                 )}`;
          // Fire and forget; delivery failures are logged by notifyAll
          void notifyAll(this.alertEmitter, [
               notice,
               ...alerts.map((alert) => `LOW STOCK ALERT: ${alert}`),
          ]);

          return { success: true, message, alerts, outcome: 'COMMITTED' };
     }

     async completeOrder(orderId: string): Promise<SettlementResult> {
          let order: Order | null;
          try {
               order = await withRetry(() => this.store.getOrder(orderId), this.retryPolicy, {
                    operation: `load order ${orderId}`,
                    sleep: this.sleep,
               });
          } catch (error) {
               return this.failure(error, createChildLogger({ orderId }));
          }

          if (!order) {
               return this.failure(new OrderNotFoundError(orderId), createChildLogger({ orderId }));
          }

          const lines = order.ingredients.map(({ itemId, quantity }) => ({ itemId, quantity }));
          return this.settle(buildSettlementRequest('ORDER_COMPLETION', order.id, lines));
     }

     async processDirectSale(
          lines: SettlementLine[],
          saleId: string = generateSaleId(this.clock())
     ): Promise<SettlementResult & { saleId: string }> {
          let request: SettlementRequest;
          try {
               request = buildSettlementRequest('DIRECT_SALE', saleId, lines);
          } catch (error) {
               return { ...this.failure(error, createChildLogger({ saleId })), saleId };
          }
          return { ...(await this.settle(request)), saleId };
     }

     private failure(error: unknown, log: Logger): SettlementResult {
          if (error instanceof DomainError) {
               log.warn({ code: error.code, reason: error.message }, 'Settlement rejected');
               return {
                    success: false,
                    message: error.message,
                    alerts: [],
                    outcome: 'REJECTED',
                    failure: { code: error.code, statusCode: error.statusCode },
               };
          }

          if (error instanceof RetryExhaustedError) {
               log.error(
                    { err: error.lastError, attempts: error.attempts },
                    'Settlement abandoned after transient store failures'
               );
               return {
                    success: false,
                    message: 'Could not complete the settlement, please try again.',
                    alerts: [],
                    outcome: 'UNAVAILABLE',
                    failure: { code: 'STORE_UNAVAILABLE', statusCode: 503 },
               };
          }

          log.error({ err: error }, 'Settlement failed unexpectedly');
          return {
               success: false,
               message: 'Settlement failed due to an unexpected error.',
               alerts: [],
               outcome: 'ERROR',
               failure: { code: 'INTERNAL_ERROR', statusCode: 500 },
          };
     }
}
