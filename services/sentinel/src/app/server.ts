import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { registerRoutes } from './routes';
import type { Config } from '../config';
import type { Container } from '../container';

export interface ServerOptions {
  config: Config;
  logger: Logger;
  container: Container;
}

export interface SentinelServer {
  listen(): Promise<FastifyInstance>;
  close(): Promise<void>;
  app: FastifyInstance;
}

export const createServer = async ({ config, logger, container }: ServerOptions): Promise<SentinelServer> => {
  const app = Fastify({ logger: { level: config.LOG_LEVEL }, disableRequestLogging: config.NODE_ENV === 'test' });

  await registerRoutes(app, { config, container });

  return {
    listen: async () => {
      try {
        await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
      } catch (error) {
        logger.error({ err: error }, 'failed to bind sentinel server');
        throw error;
      }
      return app;
    },
    close: async () => {
      await container.close();
      await app.close();
    },
    app
  };
};

const isDirect = process.argv[1] && (
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('src/app/server.ts') ||
  process.argv[1]?.endsWith('dist/app/server.js')
);

if (isDirect) {
  (async () => {
    const { bootstrap, startEngine } = await import('./bootstrap');
    const { server, container, logger } = await bootstrap();
    await server.listen();
    await startEngine(container);

    let shuttingDown = false;
    const shutdown = (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info({ signal }, 'shutting down after the in-flight cycle');
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'shutdown failed');
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  })().catch((error) => {
    console.error('Failed to start sentinel', error);
    process.exit(1);
  });
}
