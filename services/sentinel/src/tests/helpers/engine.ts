import { createMemoryCredentialFs, FakeGateway } from '@lanwarden/gateway/testing';
import { ConfigSchema, type Config } from '../../config';
import { createLogger } from '../../logging';
import { createContainer } from '../../container';
import { createInMemoryDeviceRegistry } from '../../adapters/inMemory/devicesRepository';
import type { NewDeviceEvent, Notifier } from '../../adapters/notify/logNotifier';
import type { ScanResult, Scanner } from '../../adapters/scan/arpScan';
import type { DeviceRecord } from '../../domain/entities/device';
import type { DeviceRegistry } from '../../repositories/devicesRepo';
import { ScanFailure, type ScanFailureReason } from '../../domain/errors';

export const CREDENTIAL_PATH = '/etc/lanwarden/credentials.json';

export const testConfig = (overrides: Partial<Config> = {}): Config => ({
  ...ConfigSchema.parse({
    NODE_ENV: 'test',
    LOG_LEVEL: 'error',
    GATEWAY_URLS: 'http://gw.test',
    GATEWAY_APP_ID: 'lanwarden.test',
    CREDENTIAL_PATHS: CREDENTIAL_PATH,
    DRIFT_CHECK_EVERY: '1',
    SCAN_INTERVAL_MS: '10'
  }),
  ...overrides
});

export class StubScanner implements Scanner {
  calls = 0;
  private next: ScanResult = { ok: true, macs: new Set() };

  see(...macs: string[]) {
    this.next = { ok: true, macs: new Set(macs) };
  }

  fail(reason: ScanFailureReason = 'exec_failed') {
    this.next = { ok: false, failure: new ScanFailure(reason, `scan ${reason}`) };
  }

  async scan() {
    this.calls += 1;
    return this.next;
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: NewDeviceEvent[] = [];

  async newDevice(event: NewDeviceEvent) {
    this.events.push(event);
  }
}

export const record = (mac: string, status: DeviceRecord['status'], comment = ''): DeviceRecord => ({
  mac,
  status,
  firstSeen: new Date('2026-01-01T00:00:00.000Z'),
  lastSeen: new Date('2026-01-01T00:00:00.000Z'),
  comment
});

export interface TestEngineOptions {
  gateway?: FakeGateway;
  seed?: DeviceRecord[];
  config?: Partial<Config>;
  registry?: DeviceRegistry;
  /** Omit the credential file entirely. */
  withoutCredentials?: boolean;
}

export const createTestEngine = async ({
  gateway = new FakeGateway(),
  seed = [],
  config,
  registry = createInMemoryDeviceRegistry(seed),
  withoutCredentials
}: TestEngineOptions = {}) => {
  const memory = createMemoryCredentialFs(
    withoutCredentials ? {} : { [CREDENTIAL_PATH]: JSON.stringify({ app_token: gateway.appToken }) }
  );
  const scanner = new StubScanner();
  const notifier = new RecordingNotifier();
  const resolved = testConfig(config);
  const logger = createLogger({ level: 'silent' });
  const container = await createContainer({
    config: resolved,
    logger,
    overrides: { registry, scanner, notifier, fetchImpl: gateway.fetch, credentialFs: memory.fs }
  });
  return { gateway, memory, scanner, notifier, registry, container, config: resolved, logger };
};
