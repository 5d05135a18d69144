// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Store
export * from './store';

// Services
export * from './services/audit-log';
export * from './services/cart-service';
export * from './services/inventory-service';
export * from './services/order-service';
export * from './services/settlement-engine';
export * from './services/supplier-service';

// Notifications
export * from './notifications/alert-emitter';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/money';
export * from './utils/retry';
