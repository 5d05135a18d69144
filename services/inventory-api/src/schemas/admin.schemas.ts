import { errorResponse } from './common.schemas';

const report = {
     type: 'object',
     properties: {
          itemId: { type: 'string' },
          quantity: { type: 'integer' },
          historyTotal: { type: 'integer' },
          entryCount: { type: 'integer' },
          consistent: { type: 'boolean' },
     },
};

export const reconcileAllSchema = {
     tags: ['admin'],
     summary: 'Reconcile every item against its stock history',
     description: 'An item is consistent when its quantity equals the sum of its history changes.',
     response: {
          200: {
               type: 'object',
               properties: {
                    consistent: { type: 'boolean' },
                    itemCount: { type: 'integer' },
                    mismatches: { type: 'array', items: report },
                    reports: { type: 'array', items: report },
               },
          },
     },
};

export const reconcileItemSchema = {
     tags: ['admin'],
     summary: 'Reconcile one item against its stock history',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: {
               itemId: { type: 'string' },
          },
     },
     response: {
          200: report,
          404: { description: 'Item not found', ...errorResponse },
     },
};
