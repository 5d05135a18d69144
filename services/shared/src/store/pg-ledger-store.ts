import { Pool, PoolClient, QueryResultRow } from 'pg';
import { checkConnection, closePool, getPool, withTransaction } from '../db/client';
import {
     DirectSale,
     InventoryItem,
     Order,
     OrderStatus,
     PricedLine,
     StockHistoryEntry,
     StockHistoryType,
     Supplier,
} from '../types/inventory.types';
import { DomainError, TransactionConflictError, TransientStoreError } from '../utils/errors';
import {
     ItemUpdate,
     LedgerStore,
     LedgerTransaction,
     NewStockHistoryEntry,
} from './ledger-store';

// SQLSTATE classes that mean "try again": serialization/deadlock and lost connections
const CONFLICT_CODES = new Set(['40001', '40P01']);
const CONNECTION_CODES = new Set(['57P01', '57P02', '57P03', '53300']);
const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
     if (typeof error === 'object' && error !== null && 'code' in error) {
          const { code } = error;
          return typeof code === 'string' ? code : undefined;
     }
     return undefined;
}

/**
 * Translate driver failures into the store error taxonomy. Anything not recognised as
 * transient is returned unchanged.
 */
export function toStoreError(error: unknown): unknown {
     if (error instanceof DomainError || error instanceof TransientStoreError) {
          return error;
     }

     const code = errorCode(error);
     if (code === undefined) {
          return error;
     }
     if (CONFLICT_CODES.has(code)) {
          return new TransactionConflictError(`sqlstate:${code}`, { cause: error });
     }
     if (CONNECTION_CODES.has(code) || code.startsWith('08') || NETWORK_CODES.has(code)) {
          const message = error instanceof Error ? error.message : code;
          return new TransientStoreError(`Database unavailable: ${message}`, { cause: error });
     }
     return error;
}

// Row shapes as returned by node-postgres (NUMERIC arrives as string)

type ItemRow = {
     id: string;
     name: string;
     quantity: number;
     purchase_price: string;
     sale_price: string;
     min_stock_alert: number | null;
     supplier_id: string | null;
     supplier_name: string | null;
     version: number;
     created_at: Date;
     updated_at: Date;
};

type HistoryRow = {
     id: string;
     item_id: string;
     type: StockHistoryType;
     quantity_change: number;
     details: string;
     created_at: Date;
};

type OrderRow = {
     id: string;
     title: string;
     price: string;
     ingredients: PricedLine[];
     status: OrderStatus;
     created_at: Date;
     completed_at: Date | null;
};

type SaleRow = {
     id: string;
     request_id: string;
     lines: PricedLine[];
     total: string;
     created_at: Date;
};

type SupplierRow = {
     id: string;
     name: string;
     contact: string | null;
     phone: string | null;
     email: string | null;
     created_at: Date;
};

const ITEM_COLUMNS = `id, name, quantity, purchase_price, sale_price, min_stock_alert,
       supplier_id, supplier_name, version, created_at, updated_at`;
const ORDER_COLUMNS = 'id, title, price, ingredients, status, created_at, completed_at';
const SALE_COLUMNS = 'id, request_id, lines, total, created_at';

function mapItem(row: ItemRow): InventoryItem {
     return {
          id: row.id,
          name: row.name,
          quantity: parseInt(String(row.quantity), 10),
          purchasePrice: parseFloat(row.purchase_price),
          salePrice: parseFloat(row.sale_price),
          minStockAlert: row.min_stock_alert ?? undefined,
          supplierId: row.supplier_id ?? undefined,
          supplierName: row.supplier_name ?? undefined,
          version: parseInt(String(row.version), 10),
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

function mapHistory(row: HistoryRow): StockHistoryEntry {
     return {
          id: String(row.id),
          itemId: row.item_id,
          timestamp: row.created_at,
          type: row.type,
          quantityChange: parseInt(String(row.quantity_change), 10),
          details: row.details,
     };
}

function mapOrder(row: OrderRow): Order {
     return {
          id: row.id,
          title: row.title,
          price: parseFloat(row.price),
          ingredients: row.ingredients,
          status: row.status,
          createdAt: row.created_at,
          completedAt: row.completed_at ?? undefined,
     };
}

function mapSale(row: SaleRow): DirectSale {
     return {
          id: row.id,
          requestId: row.request_id,
          lines: row.lines,
          total: parseFloat(row.total),
          createdAt: row.created_at,
     };
}

function mapSupplier(row: SupplierRow): Supplier {
     return {
          id: row.id,
          name: row.name,
          contact: row.contact ?? undefined,
          phone: row.phone ?? undefined,
          email: row.email ?? undefined,
          createdAt: row.created_at,
     };
}

interface Queryable {
     query(text: string, values?: unknown[]): Promise<unknown>;
}

async function insertHistory(
     db: Queryable,
     itemId: string,
     entry: NewStockHistoryEntry
): Promise<void> {
     await db.query(
          `
      INSERT INTO stock_history (item_id, type, quantity_change, details, created_at)
      VALUES ($1, $2, $3, $4, $5)
    `,
          [itemId, entry.type, entry.quantityChange, entry.details, entry.timestamp]
     );
}

/**
 * Transaction scope over one pooled connection running at REPEATABLE READ.
 *
 * Every write carries the version it was computed from, so a row changed by a concurrent
 * commit produces either a zero-row update or a serialization failure; both abort.
 */
export class PgLedgerTransaction implements LedgerTransaction {
     constructor(private readonly client: PoolClient) {}

     async getItem(itemId: string): Promise<InventoryItem | null> {
          const items = await this.getItems([itemId]);
          return items.get(itemId) ?? null;
     }

     async getItems(itemIds: string[]): Promise<Map<string, InventoryItem>> {
          const { rows } = await this.client.query<ItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_item
      WHERE id = ANY($1::text[])
    `,
               [itemIds]
          );
          return new Map(rows.map((row) => [row.id, mapItem(row)]));
     }

     async createItem(item: InventoryItem): Promise<void> {
          const result = await this.client.query(
               `
      INSERT INTO inventory_item (
        id, name, quantity, purchase_price, sale_price, min_stock_alert,
        supplier_id, supplier_name, version, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO NOTHING
    `,
               [
                    item.id,
                    item.name,
                    item.quantity,
                    item.purchasePrice,
                    item.salePrice,
                    item.minStockAlert ?? null,
                    item.supplierId ?? null,
                    item.supplierName ?? null,
                    item.version,
                    item.createdAt,
                    item.updatedAt,
               ]
          );

          if ((result.rowCount ?? 0) === 0) {
               throw new TransactionConflictError(`item:${item.id}`);
          }
     }

     async updateItem(item: InventoryItem, changes: ItemUpdate): Promise<void> {
          const next = { ...item, ...changes };
          const result = await this.client.query(
               `
      UPDATE inventory_item
      SET name = $2,
          quantity = $3,
          purchase_price = $4,
          sale_price = $5,
          min_stock_alert = $6,
          supplier_id = $7,
          supplier_name = $8,
          version = version + 1,
          updated_at = NOW()
      WHERE id = $1 AND version = $9
    `,
               [
                    item.id,
                    next.name,
                    next.quantity,
                    next.purchasePrice,
                    next.salePrice,
                    next.minStockAlert ?? null,
                    next.supplierId ?? null,
                    next.supplierName ?? null,
                    item.version,
               ]
          );

          if ((result.rowCount ?? 0) === 0) {
               throw new TransactionConflictError(`item:${item.id}`);
          }
     }

     async appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void> {
          await insertHistory(this.client, itemId, entry);
     }

     async getOrder(orderId: string): Promise<Order | null> {
          const { rows } = await this.client.query<OrderRow>(
               `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
               [orderId]
          );
          return rows.length > 0 ? mapOrder(rows[0]) : null;
     }

     async completeOrder(order: Order, completedAt: Date): Promise<void> {
          const result = await this.client.query(
               `
      UPDATE orders
      SET status = 'completed',
          completed_at = $2
      WHERE id = $1 AND status = 'processing'
    `,
               [order.id, completedAt]
          );

          if ((result.rowCount ?? 0) === 0) {
               throw new TransactionConflictError(`order:${order.id}`);
          }
     }

     async getSale(saleId: string): Promise<DirectSale | null> {
          const { rows } = await this.client.query<SaleRow>(
               `SELECT ${SALE_COLUMNS} FROM direct_sale WHERE id = $1`,
               [saleId]
          );
          return rows.length > 0 ? mapSale(rows[0]) : null;
     }

     async recordSale(sale: DirectSale): Promise<void> {
          const result = await this.client.query(
               `
      INSERT INTO direct_sale (id, request_id, lines, total, created_at)
      VALUES ($1, $2, $3::jsonb, $4, $5)
      ON CONFLICT (id) DO NOTHING
    `,
               [sale.id, sale.requestId, JSON.stringify(sale.lines), sale.total, sale.createdAt]
          );

          if ((result.rowCount ?? 0) === 0) {
               throw new TransactionConflictError(`sale:${sale.id}`);
          }
     }
}

export class PgLedgerStore implements LedgerStore {
     private readonly pool: Pool;
     private readonly ownsSharedPool: boolean;

     constructor(pool?: Pool) {
          this.pool = pool ?? getPool();
          this.ownsSharedPool = pool === undefined;
     }

     async getItem(itemId: string): Promise<InventoryItem | null> {
          const { rows } = await this.query<ItemRow>(
               `SELECT ${ITEM_COLUMNS} FROM inventory_item WHERE id = $1`,
               [itemId]
          );
          return rows.length > 0 ? mapItem(rows[0]) : null;
     }

     async putItem(item: InventoryItem): Promise<void> {
          await this.query(
               `
      INSERT INTO inventory_item (
        id, name, quantity, purchase_price, sale_price, min_stock_alert,
        supplier_id, supplier_name, version, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO UPDATE
      SET name = EXCLUDED.name,
          quantity = EXCLUDED.quantity,
          purchase_price = EXCLUDED.purchase_price,
          sale_price = EXCLUDED.sale_price,
          min_stock_alert = EXCLUDED.min_stock_alert,
          supplier_id = EXCLUDED.supplier_id,
          supplier_name = EXCLUDED.supplier_name,
          version = inventory_item.version + 1,
          updated_at = EXCLUDED.updated_at
    `,
               [
                    item.id,
                    item.name,
                    item.quantity,
                    item.purchasePrice,
                    item.salePrice,
                    item.minStockAlert ?? null,
                    item.supplierId ?? null,
                    item.supplierName ?? null,
                    item.version,
                    item.createdAt,
                    item.updatedAt,
               ]
          );
     }

     async listItems(): Promise<InventoryItem[]> {
          const { rows } = await this.query<ItemRow>(
               `SELECT ${ITEM_COLUMNS} FROM inventory_item ORDER BY LOWER(name), id`
          );
          return rows.map(mapItem);
     }

     async appendHistory(itemId: string, entry: NewStockHistoryEntry): Promise<void> {
          try {
               await insertHistory(this.pool, itemId, entry);
          } catch (error) {
               throw toStoreError(error);
          }
     }

     async listHistory(itemId: string): Promise<StockHistoryEntry[]> {
          const { rows } = await this.query<HistoryRow>(
               `
      SELECT id, item_id, type, quantity_change, details, created_at
      FROM stock_history
      WHERE item_id = $1
      ORDER BY id
    `,
               [itemId]
          );
          return rows.map(mapHistory);
     }

     async runTransaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
          try {
               return await withTransaction((client) => fn(new PgLedgerTransaction(client)), {
                    isolationLevel: 'REPEATABLE READ',
                    pool: this.pool,
               });
          } catch (error) {
               throw toStoreError(error);
          }
     }

     async createOrder(order: Order): Promise<void> {
          await this.query(
               `
      INSERT INTO orders (id, title, price, ingredients, status, created_at)
      VALUES ($1, $2, $3, $4::jsonb, $5, $6)
    `,
               [
                    order.id,
                    order.title,
                    order.price,
                    JSON.stringify(order.ingredients),
                    order.status,
                    order.createdAt,
               ]
          );
     }

     async getOrder(orderId: string): Promise<Order | null> {
          const { rows } = await this.query<OrderRow>(
               `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
               [orderId]
          );
          return rows.length > 0 ? mapOrder(rows[0]) : null;
     }

     async listOrders(status?: OrderStatus): Promise<Order[]> {
          const { rows } = await this.query<OrderRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE ($1::text IS NULL OR status = $1)
      ORDER BY created_at DESC
    `,
               [status ?? null]
          );
          return rows.map(mapOrder);
     }

     async listCompletedOrders(from: Date, to: Date): Promise<Order[]> {
          const { rows } = await this.query<OrderRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE status = 'completed'
        AND completed_at >= $1
        AND completed_at < $2
      ORDER BY created_at DESC
    `,
               [from, to]
          );
          return rows.map(mapOrder);
     }

     async countOrders(): Promise<number> {
          const { rows } = await this.query<{ count: string }>(
               'SELECT COUNT(*) AS count FROM orders'
          );
          return parseInt(rows[0].count, 10);
     }

     async deleteProcessingOrder(orderId: string): Promise<boolean> {
          const result = await this.query(
               `DELETE FROM orders WHERE id = $1 AND status = 'processing'`,
               [orderId]
          );
          return (result.rowCount ?? 0) > 0;
     }

     async getSale(saleId: string): Promise<DirectSale | null> {
          const { rows } = await this.query<SaleRow>(
               `SELECT ${SALE_COLUMNS} FROM direct_sale WHERE id = $1`,
               [saleId]
          );
          return rows.length > 0 ? mapSale(rows[0]) : null;
     }

     async addSupplier(supplier: Supplier): Promise<void> {
          await this.query(
               `
      INSERT INTO supplier (id, name, contact, phone, email, created_at)
      VALUES ($1, $2, $3, $4, $5, $6)
    `,
               [
                    supplier.id,
                    supplier.name,
                    supplier.contact ?? null,
                    supplier.phone ?? null,
                    supplier.email ?? null,
                    supplier.createdAt,
               ]
          );
     }

     async getSupplier(supplierId: string): Promise<Supplier | null> {
          const { rows } = await this.query<SupplierRow>(
               'SELECT id, name, contact, phone, email, created_at FROM supplier WHERE id = $1',
               [supplierId]
          );
          return rows.length > 0 ? mapSupplier(rows[0]) : null;
     }

     async listSuppliers(): Promise<Supplier[]> {
          const { rows } = await this.query<SupplierRow>(
               'SELECT id, name, contact, phone, email, created_at FROM supplier ORDER BY LOWER(name)'
          );
          return rows.map(mapSupplier);
     }

     async checkHealth(): Promise<boolean> {
          return checkConnection(this.pool);
     }

     async close(): Promise<void> {
          if (this.ownsSharedPool) {
               await closePool();
          } else {
               await this.pool.end();
          }
     }

     private async query<R extends QueryResultRow = QueryResultRow>(
          text: string,
          values?: unknown[]
     ) {
          try {
               return await this.pool.query<R>(text, values);
          } catch (error) {
               throw toStoreError(error);
          }
     }
}
