import type { FastifyInstance } from 'fastify';
import { registerHealthRoute } from './meta/health';
import { registerErrorHandler } from './meta/errorHandler';
import { statusRoutes } from './modules/status';
import { devicesRoutes } from './modules/devices';
import type { Container } from '../../container';
import type { Config } from '../../config';

export const registerRoutes = async (
  app: FastifyInstance,
  context: { config: Config; container: Container }
) => {
  registerErrorHandler(app);
  await registerHealthRoute(app);
  await statusRoutes(app, context);
  await devicesRoutes(app, context);
};
