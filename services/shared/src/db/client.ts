import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
     isolationLevel?: IsolationLevel;
     pool?: Pool;
}

function buildConfig(): PoolConfig {
     const isTest = process.env.NODE_ENV === 'test';
     return {
          connectionString: process.env.DATABASE_URL,
          // In test mode, use minimal connections and short timeouts
          min: isTest ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
          max: isTest ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
          idleTimeoutMillis: isTest ? 100 : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
          connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
     };
}

let pool: Pool | null = null;
let initialization: Promise<Pool> | null = null;

/**
 * Process-wide pool. Created on first use; later calls return the same handle.
 */
export function getPool(): Pool {
     if (!pool) {
          pool = new Pool(buildConfig());

          // Log pool errors
          pool.on('error', (err) => {
               logger.error({ err }, 'Unexpected PostgreSQL pool error');
          });
     }
     return pool;
}

/**
 * Create the pool and verify connectivity once. Concurrent callers share the same
 * in-flight initialization; a failed attempt can be retried.
 */
export function initializeDatabase(): Promise<Pool> {
     if (!initialization) {
          initialization = (async () => {
               const db = getPool();
               if (!(await checkConnection(db))) {
                    throw new Error('Database connection check failed');
               }
               logger.info('Database connection initialized');
               return db;
          })().catch((err: unknown) => {
               initialization = null;
               throw err;
          });
     }
     return initialization;
}

// Connection health check
export async function checkConnection(db: Pool = getPool()): Promise<boolean> {
     try {
          const client = await db.connect();
          try {
               await client.query('SELECT 1');
          } finally {
               client.release();
          }
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(
     fn: (client: PoolClient) => Promise<T>,
     options: TransactionOptions = {}
): Promise<T> {
     const client = await (options.pool ?? getPool()).connect();
     try {
          await client.query(
               options.isolationLevel ? `BEGIN ISOLATION LEVEL ${options.isolationLevel}` : 'BEGIN'
          );
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               logger.error({ err: rollbackError }, 'Rollback failed');
          }
          throw err;
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     if (!pool) return;
     const current = pool;
     pool = null;
     initialization = null;
     await current.end();
     logger.info('Database pool closed');
}
