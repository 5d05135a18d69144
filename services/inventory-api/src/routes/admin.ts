import { FastifyInstance } from 'fastify';
import type { AppDependencies } from '../dependencies';
import { reconcileAllSchema, reconcileItemSchema } from '../schemas/admin.schemas';
import { sendError } from './errors';

export async function registerAdminRoutes(app: FastifyInstance, deps: AppDependencies) {
     const { audit } = deps;

     // Full ledger reconciliation
     app.get('/reconciliation', { schema: reconcileAllSchema }, async (request, reply) => {
          try {
               const reports = await audit.reconcileAll();
               const mismatches = reports.filter((report) => !report.consistent);

               if (mismatches.length > 0) {
                    request.log.warn(
                         { mismatchCount: mismatches.length },
                         'Reconciliation found inconsistent items'
                    );
               }

               return reply.send({
                    consistent: mismatches.length === 0,
                    itemCount: reports.length,
                    mismatches,
                    reports,
               });
          } catch (error) {
               return sendError(request, reply, error, 'reconcile ledger');
          }
     });

     app.get<{ Params: { itemId: string } }>(
          '/reconciliation/:itemId',
          { schema: reconcileItemSchema },
          async (request, reply) => {
               try {
                    const report = await audit.reconcileItem(request.params.itemId);
                    return reply.send(report);
               } catch (error) {
                    return sendError(request, reply, error, 'reconcile item');
               }
          }
     );
}
