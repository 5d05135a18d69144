import { FastifyInstance } from 'fastify';
import type { NewSupplier } from '@stock-ledger/shared/src/types/inventory.types';
import type { AppDependencies } from '../dependencies';
import {
     addSupplierSchema,
     getSupplierSchema,
     listSuppliersSchema,
} from '../schemas/suppliers.schemas';
import { sendError } from './errors';

export async function registerSupplierRoutes(app: FastifyInstance, deps: AppDependencies) {
     const { supplierService } = deps;

     app.post<{ Body: NewSupplier }>('/', { schema: addSupplierSchema }, async (request, reply) => {
          try {
               const supplier = await supplierService.addSupplier(request.body);
               return reply.code(201).send(supplier);
          } catch (error) {
               return sendError(request, reply, error, 'add supplier');
          }
     });

     app.get('/', { schema: listSuppliersSchema }, async (request, reply) => {
          try {
               const suppliers = await supplierService.listSuppliers();
               return reply.send({ suppliers });
          } catch (error) {
               return sendError(request, reply, error, 'list suppliers');
          }
     });

     app.get<{ Params: { supplierId: string } }>(
          '/:supplierId',
          { schema: getSupplierSchema },
          async (request, reply) => {
               try {
                    const supplier = await supplierService.getSupplier(request.params.supplierId);
                    return reply.send(supplier);
               } catch (error) {
                    return sendError(request, reply, error, 'get supplier');
               }
          }
     );
}
