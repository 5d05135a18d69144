import {
     cartLine,
     cartUpdateResponse,
     errorResponse,
     settlementLines,
     settlementResponse,
} from './common.schemas';

export const processSaleSchema = {
     tags: ['sales'],
     summary: 'Process a point-of-sale sale',
     description:
          'Decrements stock for every line atomically and records the sale. A sale id is generated when none is given; replaying a recorded id is rejected.',
     body: {
          type: 'object',
          required: ['lines'],
          properties: {
               saleId: { type: 'string', minLength: 1, example: 'SALE-20240501-101500-1a2b' },
               lines: settlementLines,
          },
     },
     response: {
          201: { description: 'Sale processed', ...settlementResponse },
          400: { description: 'Invalid sale lines', ...errorResponse },
          404: { description: 'Item not found', ...errorResponse },
          409: { description: 'Insufficient stock or sale already recorded', ...errorResponse },
          500: { description: 'Unexpected failure', ...errorResponse },
          503: { description: 'Store unavailable after retries', ...errorResponse },
     },
};

export const scanToCartSchema = {
     tags: ['sales'],
     summary: 'Add one unit of a scanned product to the sale cart',
     body: {
          type: 'object',
          required: ['barcode'],
          properties: {
               barcode: { type: 'string' },
               cart: { type: 'array', items: cartLine, default: [] },
          },
     },
     response: {
          200: cartUpdateResponse,
     },
};
