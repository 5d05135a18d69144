import { randomUUID } from 'crypto';
import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import type { AppDependencies } from './dependencies';
import { registerInventoryRoutes } from './routes/inventory';
import { registerOrderRoutes } from './routes/orders';
import { registerSalesRoutes } from './routes/sales';
import { registerSupplierRoutes } from './routes/suppliers';
import { registerAdminRoutes } from './routes/admin';

export interface BuildAppOptions {
     logger?: boolean;
     /** Serve the OpenAPI document and UI at /docs */
     docs?: boolean;
}

export async function buildApp(
     deps: AppDependencies,
     options: BuildAppOptions = {}
): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger === false ? false : { level: process.env.LOG_LEVEL || 'info' },
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const correlationId = req.headers['x-correlation-id'];
               return typeof correlationId === 'string' && correlationId
                    ? correlationId
                    : `req-${randomUUID()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // Validation and body-parsing failures use the same body as domain errors
     app.setErrorHandler((error, request, reply) => {
          if (error.validation) {
               return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
          }

          const statusCode = error.statusCode ?? 500;
          if (statusCode >= 500) {
               request.log.error({ err: error }, 'Unhandled request error');
               return reply.code(500).send({
                    error: 'INTERNAL_ERROR',
                    message: 'An unexpected error occurred',
               });
          }

          return reply.code(statusCode).send({
               error: error.code ?? 'BAD_REQUEST',
               message: error.message,
          });
     });

     // CORS
     await app.register(cors, {
          origin: true,
     });

     if (options.docs !== false) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Stock Ledger API',
                         description:
                              'Inventory ledger with atomic stock settlement for orders and point-of-sale sales',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:3000', description: 'Development' }],
                    tags: [
                         { name: 'inventory', description: 'Items, stock history and barcode lookup' },
                         { name: 'orders', description: 'Order lifecycle and completion' },
                         { name: 'sales', description: 'Point-of-sale direct sales' },
                         { name: 'suppliers', description: 'Supplier registry' },
                         { name: 'admin', description: 'Ledger reconciliation' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check against the ledger store',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             store: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const storeHealthy = await deps.store.checkHealth();
                    if (!storeHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Ledger store unavailable',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              store: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerInventoryRoutes, { prefix: '/inventory', ...deps });
     await app.register(registerOrderRoutes, { prefix: '/orders', ...deps });
     await app.register(registerSalesRoutes, { prefix: '/sales', ...deps });
     await app.register(registerSupplierRoutes, { prefix: '/suppliers', ...deps });
     await app.register(registerAdminRoutes, { prefix: '/admin', ...deps });

     return app;
}
