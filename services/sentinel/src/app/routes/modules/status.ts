import type { FastifyInstance } from 'fastify';
import type { Container } from '../../../container';

export const statusRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const { reconciler, metrics } = container.services;

  app.get('/status', async () => ({
    gateway: container.gateway.session.status(),
    loop: { running: container.runner.isRunning() },
    lastCycle: reconciler.lastReport(),
    cycles: reconciler.completedCycles()
  }));

  app.get('/metrics', async (_request, reply) => {
    const registry = metrics.getRegistry();
    reply.type(registry.contentType);
    return registry.metrics();
  });
};
