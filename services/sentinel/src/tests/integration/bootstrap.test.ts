import { afterEach, describe, expect, it } from 'vitest';
import { FakeGateway, createMemoryCredentialFs } from '@lanwarden/gateway/testing';
import { bootstrap, startEngine } from '../../app/bootstrap';
import type { Container } from '../../container';
import { createInMemoryDeviceRegistry } from '../../adapters/inMemory/devicesRepository';
import { CREDENTIAL_PATH, StubScanner, createTestEngine, record, testConfig } from '../helpers/engine';

const BANNED = 'aa:bb:cc:dd:ee:07';

describe('startEngine', () => {
  let container: Container | undefined;

  afterEach(async () => {
    await container?.close();
    container = undefined;
  });

  it('pushes banned devices to the gateway before the loop starts', async () => {
    const engine = await createTestEngine({ seed: [record(BANNED, 'banned'), record('aa:bb:cc:dd:ee:08', 'authorized')] });
    container = engine.container;

    await startEngine(engine.container);

    expect(engine.gateway.blockedMacs()).toEqual([BANNED]);
    expect(engine.container.runner.isRunning()).toBe(true);
    expect(engine.container.gateway.session.status().state).toBe('connected');
    await expect.poll(() => engine.scanner.calls).toBeGreaterThanOrEqual(1);
  });

  it('keeps the loop running in degraded mode when no credentials exist', async () => {
    const engine = await createTestEngine({ seed: [record(BANNED, 'banned')], withoutCredentials: true });
    container = engine.container;
    engine.scanner.see('aa:bb:cc:dd:ee:09');

    await startEngine(engine.container);
    await expect.poll(() => engine.scanner.calls).toBeGreaterThanOrEqual(1);

    expect(engine.container.gateway.session.isDegraded()).toBe(true);
    expect(engine.container.runner.isRunning()).toBe(true);
    expect(engine.gateway.calls).toHaveLength(0);
    await expect.poll(() => engine.registry.getStatus('aa:bb:cc:dd:ee:09')).toBe('quarantine');
  });
});

describe('bootstrap', () => {
  it('wires a server over the supplied adapters', async () => {
    const gateway = new FakeGateway();
    const memory = createMemoryCredentialFs({ [CREDENTIAL_PATH]: JSON.stringify({ app_token: gateway.appToken }) });
    const { server } = await bootstrap({
      config: testConfig({ LOG_LEVEL: 'error' }),
      registry: createInMemoryDeviceRegistry([record(BANNED, 'banned')]),
      scanner: new StubScanner(),
      fetchImpl: gateway.fetch,
      credentialFs: memory.fs
    });

    const response = await server.app.inject({ method: 'GET', url: `/devices/${BANNED}` });
    await server.close();

    expect(response.json()).toMatchObject({ mac: BANNED, status: 'banned' });
  });
});
