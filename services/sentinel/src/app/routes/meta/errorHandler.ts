import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { InvalidMacError, NotFoundError } from '../../../domain/errors';

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof InvalidMacError) {
      return reply.status(400).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'VALIDATION', message: 'invalid request', issues: error.issues });
    }
    if (error.validation) {
      return reply.status(400).send({ error: 'VALIDATION', message: error.message });
    }
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ error: error.code, message: error.message });
    }
    app.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'INTERNAL', message: 'internal_error' });
  });
};
