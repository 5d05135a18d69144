import { errorResponse } from './common.schemas';

const supplier = {
     type: 'object',
     properties: {
          id: { type: 'string' },
          name: { type: 'string', example: 'Hillside Roasters' },
          contact: { type: 'string' },
          phone: { type: 'string' },
          email: { type: 'string' },
          createdAt: { type: 'string', format: 'date-time' },
     },
};

export const addSupplierSchema = {
     tags: ['suppliers'],
     summary: 'Register a supplier',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1 },
               contact: { type: 'string' },
               phone: { type: 'string' },
               email: { type: 'string' },
          },
     },
     response: {
          201: supplier,
          400: { description: 'Invalid supplier', ...errorResponse },
     },
};

export const listSuppliersSchema = {
     tags: ['suppliers'],
     summary: 'List suppliers by name',
     response: {
          200: {
               type: 'object',
               properties: {
                    suppliers: { type: 'array', items: supplier },
               },
          },
     },
};

export const getSupplierSchema = {
     tags: ['suppliers'],
     summary: 'Get a supplier',
     params: {
          type: 'object',
          required: ['supplierId'],
          properties: {
               supplierId: { type: 'string' },
          },
     },
     response: {
          200: supplier,
          404: { description: 'Supplier not found', ...errorResponse },
     },
};
