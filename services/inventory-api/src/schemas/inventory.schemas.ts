import { errorResponse, inventoryItem } from './common.schemas';

const itemIdParams = {
     type: 'object',
     required: ['itemId'],
     properties: {
          itemId: { type: 'string', description: 'Item id (barcode or SKU)' },
     },
};

export const registerItemSchema = {
     tags: ['inventory'],
     summary: 'Register a new inventory item',
     description:
          'Creates the item together with its INITIAL_STOCK history entry. The id is usually the product barcode.',
     body: {
          type: 'object',
          required: ['id', 'name', 'quantity'],
          properties: {
               id: { type: 'string', minLength: 1, example: '7790001000011' },
               name: { type: 'string', minLength: 1, example: 'Espresso Beans 1kg' },
               quantity: { type: 'integer', minimum: 0, example: 24 },
               purchasePrice: { type: 'number', minimum: 0, example: 14.5 },
               salePrice: { type: 'number', minimum: 0, example: 22 },
               minStockAlert: { type: 'integer', minimum: 0, example: 5 },
               supplierId: { type: 'string' },
          },
     },
     response: {
          201: { description: 'Item registered', ...inventoryItem },
          400: { description: 'Invalid item', ...errorResponse },
          404: { description: 'Supplier not found', ...errorResponse },
          409: { description: 'Item already exists', ...errorResponse },
     },
};

export const listItemsSchema = {
     tags: ['inventory'],
     summary: 'List inventory items',
     description: 'Items sorted by name. `search` matches name or id, case-insensitively.',
     querystring: {
          type: 'object',
          properties: {
               search: { type: 'string' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    items: { type: 'array', items: inventoryItem },
               },
          },
     },
};

export const lowStockSchema = {
     tags: ['inventory'],
     summary: 'Items at or below their minimum stock threshold',
     response: {
          200: {
               type: 'object',
               properties: {
                    items: { type: 'array', items: inventoryItem },
               },
          },
     },
};

export const getItemSchema = {
     tags: ['inventory'],
     summary: 'Get an inventory item',
     params: itemIdParams,
     response: {
          200: inventoryItem,
          404: { description: 'Item not found', ...errorResponse },
     },
};

export const updateItemSchema = {
     tags: ['inventory'],
     summary: 'Edit an inventory item',
     description:
          'Quantity changes are recorded as a MANUAL_ADJUSTMENT of the difference. Send null to clear the threshold or supplier.',
     params: itemIdParams,
     body: {
          type: 'object',
          minProperties: 1,
          properties: {
               name: { type: 'string', minLength: 1 },
               quantity: { type: 'integer', minimum: 0 },
               purchasePrice: { type: 'number', minimum: 0 },
               salePrice: { type: 'number', minimum: 0 },
               minStockAlert: { type: ['integer', 'null'], minimum: 0 },
               supplierId: { type: ['string', 'null'] },
               details: { type: 'string', description: 'Note stored on the history entry' },
          },
     },
     response: {
          200: inventoryItem,
          400: { description: 'Invalid edit', ...errorResponse },
          404: { description: 'Item or supplier not found', ...errorResponse },
          503: { description: 'Store unavailable', ...errorResponse },
     },
};

export const itemHistorySchema = {
     tags: ['inventory'],
     summary: 'Stock history of an item, newest first',
     params: itemIdParams,
     response: {
          200: {
               type: 'object',
               properties: {
                    itemId: { type: 'string' },
                    entries: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'string' },
                                   timestamp: { type: 'string', format: 'date-time' },
                                   type: {
                                        type: 'string',
                                        enum: [
                                             'INITIAL_STOCK',
                                             'MANUAL_ADJUSTMENT',
                                             'ORDER_SALE',
                                             'DIRECT_SALE',
                                        ],
                                   },
                                   quantityChange: { type: 'integer' },
                                   details: { type: 'string' },
                              },
                         },
                    },
               },
          },
          404: { description: 'Item not found', ...errorResponse },
     },
};

const scanError = {
     type: 'object',
     properties: {
          status: { type: 'string', example: 'error' },
          message: { type: 'string' },
     },
};

export const scanBarcodeSchema = {
     tags: ['inventory'],
     summary: 'Look up a scanned barcode',
     params: {
          type: 'object',
          required: ['barcode'],
          properties: {
               barcode: { type: 'string' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'found' },
                    item: inventoryItem,
               },
          },
          404: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'not_found' },
                    barcode: { type: 'string' },
               },
          },
          400: scanError,
          500: scanError,
     },
};
