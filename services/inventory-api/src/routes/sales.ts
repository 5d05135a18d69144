import { FastifyInstance } from 'fastify';
import { cartTotal } from '@stock-ledger/shared/src/services/cart-service';
import type { CartLine, SettlementLine } from '@stock-ledger/shared/src/types/inventory.types';
import type { AppDependencies } from '../dependencies';
import { processSaleSchema, scanToCartSchema } from '../schemas/sales.schemas';
import { sendSettlement } from './errors';

export async function registerSalesRoutes(app: FastifyInstance, deps: AppDependencies) {
     const { engine, cartService } = deps;

     app.post<{ Body: { saleId?: string; lines: SettlementLine[] } }>(
          '/',
          { schema: processSaleSchema },
          async (request, reply) => {
               const { saleId, lines } = request.body;
               const result = await engine.processDirectSale(lines, saleId);

               request.log.info(
                    { saleId: result.saleId, outcome: result.outcome },
                    'Direct sale handled'
               );
               return sendSettlement(reply, result, 201, { saleId: result.saleId });
          }
     );

     // Point-of-sale scanner: one unit per scan
     app.post<{ Body: { barcode: string; cart: CartLine[] } }>(
          '/cart/scan',
          { schema: scanToCartSchema },
          async (request, reply) => {
               const update = await cartService.addItemToSale(
                    request.body.barcode,
                    request.body.cart
               );
               return reply.send({ ...update, total: cartTotal(update.cart) });
          }
     );
}
