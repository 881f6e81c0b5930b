import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function sendError(reply: FastifyReply, statusCode: number, code: string, message: string): FastifyReply {
  return reply.status(statusCode).send({
    ok: false,
    error: { code, message, statusCode },
  });
}

async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, url: request.url }, 'Request failed');
      }
      return sendError(reply, error.statusCode, error.code, error.message);
    }

    // Fastify validation errors (from schema validation)
    if (error.validation) {
      return sendError(reply, 400, 'VALIDATION_ERROR', error.message);
    }

    // Rate limiting and other plugin errors carry their own 4xx status
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return sendError(reply, error.statusCode, error.code ?? 'REQUEST_ERROR', error.message);
    }

    logger.error({ err: error, url: request.url }, 'Unhandled error');
    return sendError(reply, 500, 'INTERNAL_ERROR', 'Internal server error');
  });

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) =>
    sendError(reply, 404, 'ROUTE_NOT_FOUND', `Route ${request.method} ${request.url} not found`),
  );
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
