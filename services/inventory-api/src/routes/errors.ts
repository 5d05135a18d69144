import { FastifyReply, FastifyRequest } from 'fastify';
import { SettlementResult } from '@stock-ledger/shared/src/types/inventory.types';
import { DomainError, RetryExhaustedError } from '@stock-ledger/shared/src/utils/errors';

/**
 * Map a thrown error onto the `{ error, message }` response body.
 */
export function sendError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     action: string
): FastifyReply {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     if (error instanceof RetryExhaustedError) {
          request.log.error({ err: error }, `Failed to ${action}: store unavailable`);
          return reply.code(503).send({
               error: 'STORE_UNAVAILABLE',
               message: 'The inventory store is temporarily unavailable, please try again.',
          });
     }

     request.log.error({ err: error }, `Failed to ${action}`);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export function sendSettlement(
     reply: FastifyReply,
     result: SettlementResult,
     successCode: number,
     extra: Record<string, string> = {}
): FastifyReply {
     if (result.success || !result.failure) {
          return reply.code(successCode).send({
               success: result.success,
               outcome: result.outcome,
               message: result.message,
               alerts: result.alerts,
               ...extra,
          });
     }

     return reply.code(result.failure.statusCode).send({
          error: result.failure.code,
          message: result.message,
          outcome: result.outcome,
     });
}
