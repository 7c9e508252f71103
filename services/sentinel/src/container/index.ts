import { Pool } from 'pg';
import type { Logger } from 'pino';
import {
  createCredentialStore,
  createEnforcementClient,
  createGatewayHttp,
  SessionManager,
  type CredentialFs,
  type EnforcementClient,
  type FetchLike
} from '@lanwarden/gateway';
import type { Config } from '../config';
import { createInMemoryDeviceRegistry } from '../adapters/inMemory/devicesRepository';
import { createLogNotifier, type Notifier } from '../adapters/notify/logNotifier';
import { createPostgresDeviceRegistry } from '../adapters/postgres/devicesRepository';
import { runMigrations } from '../adapters/postgres/migrate';
import { createArpScanner, type Scanner } from '../adapters/scan/arpScan';
import { createReconcileRunner, type ReconcileRunner } from '../app/runLoop';
import { SentinelMetrics } from '../domain/metrics';
import { createPolicyService, type PolicyService } from '../domain/services/policyService';
import { createReconciler, type Reconciler } from '../domain/services/reconciler';
import type { DeviceRegistry } from '../repositories/devicesRepo';

export interface ContainerOverrides {
  registry?: DeviceRegistry;
  scanner?: Scanner;
  notifier?: Notifier;
  fetchImpl?: FetchLike;
  credentialFs?: CredentialFs;
}

export interface Container {
  config: Config;
  logger: Logger;
  repos: {
    devices: DeviceRegistry;
  };
  gateway: {
    session: SessionManager;
    enforcement: EnforcementClient;
  };
  services: {
    reconciler: Reconciler;
    policy: PolicyService;
    metrics: SentinelMetrics;
  };
  runner: ReconcileRunner;
  close(): Promise<void>;
}

interface Storage {
  registry: DeviceRegistry;
  /** Present only when this container opened the connection pool and must end it. */
  pool?: Pool;
}

const buildStorage = async (config: Config): Promise<Storage> => {
  if (config.STORAGE_DRIVER !== 'postgres') {
    return { registry: createInMemoryDeviceRegistry() };
  }
  const pool = new Pool({ connectionString: config.POSTGRES_URL });
  try {
    await runMigrations(pool);
  } catch (error) {
    await pool.end();
    throw error;
  }
  return { registry: createPostgresDeviceRegistry(pool), pool };
};

export const createContainer = async ({
  config,
  logger,
  overrides = {}
}: {
  config: Config;
  logger: Logger;
  overrides?: ContainerOverrides;
}): Promise<Container> => {
  const storage: Storage = overrides.registry ? { registry: overrides.registry } : await buildStorage(config);
  const devices = storage.registry;
  const gatewayLogger = logger.child({ component: 'gateway' });

  const credentials = createCredentialStore({
    paths: config.CREDENTIAL_PATHS,
    fs: overrides.credentialFs,
    logger: gatewayLogger
  });
  const http = createGatewayHttp({
    fetchImpl: overrides.fetchImpl,
    timeoutMs: config.GATEWAY_TIMEOUT_MS,
    logger: gatewayLogger
  });
  const session = new SessionManager({
    appId: config.GATEWAY_APP_ID,
    gatewayUrls: config.GATEWAY_URLS,
    credentials,
    http,
    logger: gatewayLogger
  });
  const enforcement = createEnforcementClient({ session, logger: gatewayLogger, blockComment: config.BLOCK_COMMENT });

  const scanner =
    overrides.scanner ??
    createArpScanner({
      command: config.SCAN_COMMAND,
      args: config.SCAN_ARGS,
      interfaceName: config.SCAN_INTERFACE,
      timeoutMs: config.SCAN_TIMEOUT_MS,
      logger: logger.child({ component: 'scan' })
    });
  const notifier = overrides.notifier ?? createLogNotifier(logger.child({ component: 'notify' }));
  const metrics = new SentinelMetrics();

  const reconciler = createReconciler({
    registry: devices,
    scanner,
    enforcement,
    session,
    notifier,
    metrics,
    logger: logger.child({ component: 'reconciler' }),
    driftCheckEvery: config.DRIFT_CHECK_EVERY
  });
  const policy = createPolicyService({ registry: devices, enforcement, session, metrics, logger });
  const runner = createReconcileRunner(reconciler, { intervalMs: config.SCAN_INTERVAL_MS }, logger);

  return {
    config,
    logger,
    repos: { devices },
    gateway: { session, enforcement },
    services: { reconciler, policy, metrics },
    runner,
    async close() {
      await runner.stop();
      await storage.pool?.end();
    }
  };
};
