import { AuthError, sanitizeError } from '@lanwarden/gateway';
import { loadConfig, type Config } from '../config';
import { createLogger } from '../logging';
import { createContainer, type Container, type ContainerOverrides } from '../container';
import { createServer } from './server';

interface BootstrapOverrides extends ContainerOverrides {
  config?: Config;
}

export const bootstrap = async (overrides: BootstrapOverrides = {}) => {
  const { config: configOverride, ...containerOverrides } = overrides;
  const config = configOverride ?? loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  const container = await createContainer({ config, logger, overrides: containerOverrides });
  const server = await createServer({ config, logger, container });
  return { server, config, logger, container };
};

/**
 * Brings the gateway session up, pushes every banned device to the gateway once, then starts
 * the periodic loop. A refused or missing application token leaves the process running in
 * degraded mode: the registry keeps being maintained but nothing is enforced.
 */
export const startEngine = async (container: Container) => {
  const { session } = container.gateway;
  const { logger } = container;

  try {
    await session.initialize();
  } catch (error) {
    if (!(error instanceof AuthError)) {
      throw error;
    }
    logger.error({ err: sanitizeError(error) }, 'starting without gateway enforcement');
  }

  if (!session.isDegraded()) {
    const result = await session.ensureValidSession();
    if (result.ok) {
      await session.testConnection();
      await container.services.reconciler.enforceBannedDevices();
    } else {
      logger.warn({ err: sanitizeError(result.error) }, 'gateway not reachable at start-up, will retry each cycle');
    }
  }

  await container.runner.start();
};
