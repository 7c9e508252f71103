import { createCredentialStore } from '../src/credentials/credentialStore';
import { createGatewayHttp } from '../src/http';
import { SessionManager } from '../src/session/sessionManager';
import { FakeGateway } from '../src/testing/fakeGateway';
import { createMemoryCredentialFs } from '../src/testing/memoryFs';
import type { FetchLike } from '../src/types';

export const CREDENTIAL_PATH = '/etc/lanwarden/credentials.json';

export interface HarnessOptions {
  gateway?: FakeGateway;
  files?: Record<string, string>;
  /** Wraps the fake gateway's fetch, e.g. to hold a request open. */
  wrapFetch?: (inner: FetchLike) => FetchLike;
}

export const createHarness = ({ gateway = new FakeGateway(), files, wrapFetch }: HarnessOptions = {}) => {
  const memory = createMemoryCredentialFs(files ?? { [CREDENTIAL_PATH]: JSON.stringify({ app_token: gateway.appToken }) });
  const fetchImpl = wrapFetch ? wrapFetch(gateway.fetch) : gateway.fetch;
  const http = createGatewayHttp({ fetchImpl, timeoutMs: 1000 });
  const credentials = createCredentialStore({
    paths: [CREDENTIAL_PATH],
    fs: memory.fs,
    now: () => new Date('2026-01-02T03:04:05.000Z')
  });
  const session = new SessionManager({
    appId: gateway.appId,
    gatewayUrls: ['http://gw.test'],
    credentials,
    http
  });
  return { gateway, memory, http, credentials, session };
};

export const storedCredentials = (files: Map<string, string>): unknown => JSON.parse(files.get(CREDENTIAL_PATH) ?? '{}');
