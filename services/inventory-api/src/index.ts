import * as dotenv from 'dotenv';
import { initializeDatabase } from '@stock-ledger/shared/src/db/client';
import { createLedgerStore, PgLedgerStore } from '@stock-ledger/shared/src/store';
import { createAlertEmitter } from '@stock-ledger/shared/src/notifications/alert-emitter';
import { closeConnection } from '@stock-ledger/shared/src/messaging/client';
import { logger } from '@stock-ledger/shared/src/utils/logger';
import { loadRetryPolicy } from '@stock-ledger/shared/src/utils/retry';
import { buildApp } from './app';
import { createDependencies } from './dependencies';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.INVENTORY_API_PORT || '3000', 10);
const HOST = process.env.INVENTORY_API_HOST || '0.0.0.0';

async function main() {
     const store = createLedgerStore();
     if (store instanceof PgLedgerStore) {
          await initializeDatabase();
     }
     const alertEmitter = createAlertEmitter();
     const deps = createDependencies(store, alertEmitter, { retryPolicy: loadRetryPolicy() });
     const app = await buildApp(deps);

     // Start server
     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Inventory API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          await store.close();
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async (signal: string) => {
          logger.info({ signal }, 'Shutting down gracefully...');
          try {
               await app.close();
               await store.close();
               if (process.env.ALERT_EMITTER === 'amqp') {
                    await closeConnection();
               }
               process.exit(0);
          } catch (err) {
               logger.error({ err }, 'Error during shutdown');
               process.exit(1);
          }
     };

     process.on('SIGINT', () => void shutdown('SIGINT'));
     process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
