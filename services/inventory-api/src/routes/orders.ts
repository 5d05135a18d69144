import { FastifyInstance } from 'fastify';
import { addItemToOrderList, cartTotal } from '@stock-ledger/shared/src/services/cart-service';
import type {
     CartLine,
     CreateOrderRequest,
     OrderStatus,
} from '@stock-ledger/shared/src/types/inventory.types';
import type { AppDependencies } from '../dependencies';
import {
     addToOrderCartSchema,
     cancelOrderSchema,
     completedOrdersSchema,
     completeOrderSchema,
     createOrderSchema,
     getOrderSchema,
     listOrdersSchema,
} from '../schemas/orders.schemas';
import { sendError, sendSettlement } from './errors';

type OrderParams = { orderId: string };

export async function registerOrderRoutes(app: FastifyInstance, deps: AppDependencies) {
     const { orderService, inventoryService } = deps;

     app.post<{ Body: CreateOrderRequest }>(
          '/',
          { schema: createOrderSchema },
          async (request, reply) => {
               try {
                    const order = await orderService.createOrder(request.body);
                    return reply.code(201).send(order);
               } catch (error) {
                    return sendError(request, reply, error, 'create order');
               }
          }
     );

     app.get<{ Querystring: { status?: OrderStatus } }>(
          '/',
          { schema: listOrdersSchema },
          async (request, reply) => {
               try {
                    const orders = await orderService.listOrders(request.query.status);
                    return reply.send({ orders });
               } catch (error) {
                    return sendError(request, reply, error, 'list orders');
               }
          }
     );

     // Sales analytics window
     app.get<{ Querystring: { from: string; to: string } }>(
          '/completed',
          { schema: completedOrdersSchema },
          async (request, reply) => {
               try {
                    const orders = await orderService.listCompletedOrders(
                         new Date(request.query.from),
                         new Date(request.query.to)
                    );
                    return reply.send({ orders });
               } catch (error) {
                    return sendError(request, reply, error, 'list completed orders');
               }
          }
     );

     // Draft helper: merge an item into a cart without touching stock
     app.post<{ Body: { itemId: string; quantity: number; cart: CartLine[] } }>(
          '/cart/items',
          { schema: addToOrderCartSchema },
          async (request, reply) => {
               const { itemId, quantity, cart } = request.body;
               try {
                    const item = await inventoryService.getItem(itemId);
                    const update = addItemToOrderList(item, cart, quantity);
                    return reply.send({ ...update, total: cartTotal(update.cart) });
               } catch (error) {
                    return sendError(request, reply, error, 'add item to order cart');
               }
          }
     );

     app.get<{ Params: OrderParams }>(
          '/:orderId',
          { schema: getOrderSchema },
          async (request, reply) => {
               try {
                    const order = await orderService.getOrder(request.params.orderId);
                    return reply.send(order);
               } catch (error) {
                    return sendError(request, reply, error, 'get order');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:orderId/complete',
          { schema: completeOrderSchema },
          async (request, reply) => {
               const result = await orderService.completeOrder(request.params.orderId);
               return sendSettlement(reply, result, 200);
          }
     );

     app.delete<{ Params: OrderParams }>(
          '/:orderId',
          { schema: cancelOrderSchema },
          async (request, reply) => {
               const { orderId } = request.params;
               try {
                    await orderService.cancelOrder(orderId);
                    return reply.send({ status: 'cancelled', orderId });
               } catch (error) {
                    return sendError(request, reply, error, 'cancel order');
               }
          }
     );
}
