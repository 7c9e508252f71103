import type { FastifyInstance } from 'fastify';

const healthSchema = {
  response: {
    200: {
      type: 'object',
      properties: { status: { type: 'string', enum: ['ok'] } }
    }
  }
} as const;

export const registerHealthRoute = async (app: FastifyInstance) => {
  app.get('/health', { schema: healthSchema }, async () => ({ status: 'ok' }));
};
