import {
     cartLine,
     cartUpdateResponse,
     errorResponse,
     pricedLine,
     settlementLines,
     settlementResponse,
} from './common.schemas';

const order = {
     type: 'object',
     properties: {
          id: { type: 'string' },
          title: { type: 'string', example: 'Order #3' },
          price: { type: 'number', example: 44 },
          ingredients: { type: 'array', items: pricedLine },
          status: { type: 'string', enum: ['processing', 'completed'] },
          createdAt: { type: 'string', format: 'date-time' },
          completedAt: { type: 'string', format: 'date-time' },
     },
};

const orderIdParams = {
     type: 'object',
     required: ['orderId'],
     properties: {
          orderId: { type: 'string' },
     },
};

const orderList = {
     type: 'object',
     properties: {
          orders: { type: 'array', items: order },
     },
};

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create a processing order',
     description:
          'Snapshots current prices into the order. Stock is checked now and again when the order is completed.',
     body: {
          type: 'object',
          required: ['lines'],
          properties: {
               title: { type: 'string', example: 'Table 4' },
               lines: settlementLines,
          },
     },
     response: {
          201: { description: 'Order created', ...order },
          400: { description: 'Invalid order', ...errorResponse },
          404: { description: 'Item not found', ...errorResponse },
          409: { description: 'Insufficient stock', ...errorResponse },
     },
};

export const listOrdersSchema = {
     tags: ['orders'],
     summary: 'List orders, newest first',
     querystring: {
          type: 'object',
          properties: {
               status: { type: 'string', enum: ['processing', 'completed'] },
          },
     },
     response: {
          200: orderList,
     },
};

export const completedOrdersSchema = {
     tags: ['orders'],
     summary: 'Orders completed within a time window',
     description: '`from` is inclusive and `to` exclusive, both compared with the completion time.',
     querystring: {
          type: 'object',
          required: ['from', 'to'],
          properties: {
               from: { type: 'string', format: 'date-time' },
               to: { type: 'string', format: 'date-time' },
          },
     },
     response: {
          200: orderList,
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order',
     params: orderIdParams,
     response: {
          200: order,
          404: { description: 'Order not found', ...errorResponse },
     },
};

export const completeOrderSchema = {
     tags: ['orders'],
     summary: 'Complete an order and settle its stock',
     description:
          'Decrements every ingredient atomically and appends ORDER_SALE history. Low-stock alerts are returned on success.',
     params: orderIdParams,
     response: {
          200: { description: 'Order completed', ...settlementResponse },
          400: { description: 'Invalid order lines', ...errorResponse },
          404: { description: 'Order or item not found', ...errorResponse },
          409: { description: 'Insufficient stock or already completed', ...errorResponse },
          500: { description: 'Unexpected failure', ...errorResponse },
          503: { description: 'Store unavailable after retries', ...errorResponse },
     },
};

export const cancelOrderSchema = {
     tags: ['orders'],
     summary: 'Cancel a processing order',
     params: orderIdParams,
     response: {
          200: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'cancelled' },
                    orderId: { type: 'string' },
               },
          },
          404: { description: 'Order not found', ...errorResponse },
          409: { description: 'Order already completed', ...errorResponse },
     },
};

export const addToOrderCartSchema = {
     tags: ['orders'],
     summary: 'Add an item to an order being drafted',
     body: {
          type: 'object',
          required: ['itemId', 'quantity'],
          properties: {
               itemId: { type: 'string', minLength: 1 },
               quantity: { type: 'integer' },
               cart: { type: 'array', items: cartLine, default: [] },
          },
     },
     response: {
          200: cartUpdateResponse,
          404: { description: 'Item not found', ...errorResponse },
     },
};
