import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { GraphRunError } from '@graphrun/shared';

const errorHandlerPlugin: FastifyPluginAsync = async (server) => {
  server.setErrorHandler((error, request, reply) => {
    const { log } = request;

    if (error instanceof GraphRunError) {
      if (error.statusCode >= 500) {
        log.error({ err: error, metadata: error.metadata }, error.message);
      } else {
        log.warn({ err: error, metadata: error.metadata }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
          metadata: error.metadata,
        },
      });
    }

    // Schema validation failures from fastify-type-provider-zod
    const validation = error instanceof ZodError ? error.issues : error.validation;
    if (validation) {
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          statusCode: 400,
          details: validation,
        },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      log.warn({ err: error }, error.message);
      return reply.status(statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
          statusCode,
        },
      });
    }

    log.error({ err: error }, 'Unhandled error');
    return reply.status(statusCode).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: process.env.NODE_ENV === 'production' ? 'An error occurred' : error.message,
        statusCode,
      },
    });
  });
};

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
