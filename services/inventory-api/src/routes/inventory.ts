import { FastifyInstance } from 'fastify';
import type {
     InventoryItemPatch,
     NewInventoryItem,
} from '@stock-ledger/shared/src/types/inventory.types';
import type { AppDependencies } from '../dependencies';
import {
     getItemSchema,
     itemHistorySchema,
     listItemsSchema,
     lowStockSchema,
     registerItemSchema,
     scanBarcodeSchema,
     updateItemSchema,
} from '../schemas/inventory.schemas';
import { sendError } from './errors';

type ItemParams = { itemId: string };

export async function registerInventoryRoutes(app: FastifyInstance, deps: AppDependencies) {
     const { inventoryService } = deps;

     // Register a new item with its initial stock
     app.post<{ Body: NewInventoryItem }>(
          '/items',
          { schema: registerItemSchema },
          async (request, reply) => {
               try {
                    const item = await inventoryService.registerItem(request.body);
                    return reply.code(201).send(item);
               } catch (error) {
                    return sendError(request, reply, error, 'register item');
               }
          }
     );

     app.get<{ Querystring: { search?: string } }>(
          '/items',
          { schema: listItemsSchema },
          async (request, reply) => {
               try {
                    const items = await inventoryService.listItems(request.query.search);
                    return reply.send({ items });
               } catch (error) {
                    return sendError(request, reply, error, 'list items');
               }
          }
     );

     app.get('/items/low-stock', { schema: lowStockSchema }, async (request, reply) => {
          try {
               const items = await inventoryService.getLowStockItems();
               return reply.send({ items });
          } catch (error) {
               return sendError(request, reply, error, 'list low-stock items');
          }
     });

     app.get<{ Params: ItemParams }>(
          '/items/:itemId',
          { schema: getItemSchema },
          async (request, reply) => {
               try {
                    const item = await inventoryService.getItem(request.params.itemId);
                    return reply.send(item);
               } catch (error) {
                    return sendError(request, reply, error, 'get item');
               }
          }
     );

     // Manual edit; quantity changes are audited as adjustments
     app.patch<{ Params: ItemParams; Body: InventoryItemPatch & { details?: string } }>(
          '/items/:itemId',
          { schema: updateItemSchema },
          async (request, reply) => {
               const { details, ...patch } = request.body;
               try {
                    const item = await inventoryService.updateItem(
                         request.params.itemId,
                         patch,
                         details
                    );
                    return reply.send(item);
               } catch (error) {
                    return sendError(request, reply, error, 'update item');
               }
          }
     );

     app.get<{ Params: ItemParams }>(
          '/items/:itemId/history',
          { schema: itemHistorySchema },
          async (request, reply) => {
               const { itemId } = request.params;
               try {
                    const entries = await inventoryService.getHistory(itemId);
                    return reply.send({ itemId, entries });
               } catch (error) {
                    return sendError(request, reply, error, 'get item history');
               }
          }
     );

     app.get<{ Params: { barcode: string } }>(
          '/scan/:barcode',
          { schema: scanBarcodeSchema },
          async (request, reply) => {
               const result = await inventoryService.scanBarcode(request.params.barcode);
               switch (result.status) {
                    case 'found':
                         return reply.send(result);
                    case 'not_found':
                         return reply.code(404).send(result);
                    case 'error':
                         return reply
                              .code(request.params.barcode.trim() ? 500 : 400)
                              .send(result);
               }
          }
     );
}
