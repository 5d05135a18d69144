// Type definitions for domain models

export type StockHistoryType = 'INITIAL_STOCK' | 'MANUAL_ADJUSTMENT' | 'ORDER_SALE' | 'DIRECT_SALE';

export interface InventoryItem {
     id: string;
     name: string;
     quantity: number;
     purchasePrice: number;
     salePrice: number;
     minStockAlert?: number;
     supplierId?: string;
     supplierName?: string;
     version: number;
     createdAt: Date;
     updatedAt: Date;
}

export interface NewInventoryItem {
     id: string;
     name: string;
     quantity: number;
     purchasePrice?: number;
     salePrice?: number;
     minStockAlert?: number;
     supplierId?: string;
}

/** Fields a manual edit may change. `quantity` changes are audited as adjustments. */
export interface InventoryItemPatch {
     name?: string;
     quantity?: number;
     purchasePrice?: number;
     salePrice?: number;
     minStockAlert?: number | null;
     supplierId?: string | null;
}

export interface StockHistoryEntry {
     id?: string;
     itemId: string;
     timestamp: Date;
     type: StockHistoryType;
     quantityChange: number;
     details: string;
}

export interface SettlementLine {
     itemId: string;
     quantity: number;
}

export type SettlementKind = 'ORDER_COMPLETION' | 'DIRECT_SALE';

export interface SettlementRequest {
     requestId: string;
     kind: SettlementKind;
     /** Order id or sale id being settled */
     reference: string;
     lines: SettlementLine[];
}

export type SettlementOutcome = 'COMMITTED' | 'REJECTED' | 'UNAVAILABLE' | 'ERROR';

export interface SettlementResult {
     success: boolean;
     message: string;
     alerts: string[];
     outcome: SettlementOutcome;
     failure?: {
          code: string;
          statusCode: number;
     };
}

export interface PricedLine {
     itemId: string;
     name: string;
     quantity: number;
     purchasePrice: number;
     salePrice: number;
}

export type OrderStatus = 'processing' | 'completed';

export interface Order {
     id: string;
     title: string;
     price: number;
     ingredients: PricedLine[];
     status: OrderStatus;
     createdAt: Date;
     completedAt?: Date;
}

export interface CreateOrderRequest {
     title?: string;
     lines: SettlementLine[];
}

export interface DirectSale {
     id: string;
     requestId: string;
     lines: PricedLine[];
     total: number;
     createdAt: Date;
}

export interface Supplier {
     id: string;
     name: string;
     contact?: string;
     phone?: string;
     email?: string;
     createdAt: Date;
}

export interface NewSupplier {
     name: string;
     contact?: string;
     phone?: string;
     email?: string;
}

export interface ReconciliationReport {
     itemId: string;
     quantity: number;
     historyTotal: number;
     entryCount: number;
     consistent: boolean;
}

// Cart types used by the point-of-sale and order forms
export interface CartLine extends PricedLine {
     /** Stock seen when the line was last touched; never trusted at settlement */
     availableQuantity: number;
}

export type CartStatus = 'success' | 'warning' | 'error';

export interface CartUpdate {
     cart: CartLine[];
     status: CartStatus;
     message: string;
}

export type ScanResult =
     | { status: 'found'; item: InventoryItem }
     | { status: 'not_found'; barcode: string }
     | { status: 'error'; message: string };
