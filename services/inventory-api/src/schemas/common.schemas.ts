export const errorResponse = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'INSUFFICIENT_STOCK' },
          message: { type: 'string' },
          outcome: { type: 'string', enum: ['REJECTED', 'UNAVAILABLE', 'ERROR'] },
     },
};

export const inventoryItem = {
     type: 'object',
     properties: {
          id: { type: 'string', example: '7790001000011' },
          name: { type: 'string', example: 'Espresso Beans 1kg' },
          quantity: { type: 'integer', example: 24 },
          purchasePrice: { type: 'number', example: 14.5 },
          salePrice: { type: 'number', example: 22 },
          minStockAlert: { type: 'integer', example: 5 },
          supplierId: { type: 'string' },
          supplierName: { type: 'string' },
          version: { type: 'integer' },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

export const pricedLine = {
     type: 'object',
     properties: {
          itemId: { type: 'string' },
          name: { type: 'string' },
          quantity: { type: 'integer' },
          purchasePrice: { type: 'number' },
          salePrice: { type: 'number' },
     },
};

export const settlementLines = {
     type: 'array',
     description: 'Items and quantities to settle; each item may appear once',
     minItems: 1,
     items: {
          type: 'object',
          required: ['itemId', 'quantity'],
          properties: {
               itemId: { type: 'string', minLength: 1, example: '7790001000011' },
               quantity: { type: 'integer', minimum: 1, example: 2 },
          },
     },
};

export const cartLine = {
     type: 'object',
     required: ['itemId', 'name', 'quantity', 'purchasePrice', 'salePrice', 'availableQuantity'],
     properties: {
          ...pricedLine.properties,
          availableQuantity: { type: 'integer' },
     },
};

export const cartUpdateResponse = {
     type: 'object',
     properties: {
          cart: { type: 'array', items: cartLine },
          status: { type: 'string', enum: ['success', 'warning', 'error'] },
          message: { type: 'string' },
          total: { type: 'number' },
     },
};

export const settlementResponse = {
     type: 'object',
     properties: {
          success: { type: 'boolean' },
          outcome: { type: 'string', example: 'COMMITTED' },
          message: { type: 'string' },
          alerts: { type: 'array', items: { type: 'string' } },
          saleId: { type: 'string' },
     },
};
