import { AUTH_HEADER } from '../http';
import { signChallenge } from '../session/signature';

export interface FakeHost {
  mac: string;
  name?: string;
  active?: boolean;
  access?: boolean;
}

export interface FakeGatewayOptions {
  appId?: string;
  appToken?: string;
  apiVersion?: string;
  apiBaseUrl?: string;
  deviceName?: string;
  /** The real gateway has been seen serving the filter list both ways. */
  filterShape?: 'list' | 'map';
  hosts?: FakeHost[];
}

export interface RecordedCall {
  method: string;
  path: string;
  token?: string;
  body?: unknown;
}

interface StoredEntry {
  id: string;
  mac: string;
  type: string;
  comment?: string;
}

const json = (status: number, payload: unknown) =>
  new Response(JSON.stringify(payload), { status, headers: { 'content-type': 'application/json' } });

const ok = (result?: unknown) => json(200, result === undefined ? { success: true } : { success: true, result });
const fail = (status: number, errorCode: string, msg = errorCode) => json(status, { success: false, error_code: errorCode, msg });

const headerValue = (headers: RequestInit['headers'], name: string): string | undefined => {
  if (!headers) {
    return undefined;
  }
  return new Headers(headers).get(name) ?? undefined;
};

const parseBody = (body: RequestInit['body']): unknown => {
  if (typeof body !== 'string') {
    return undefined;
  }
  return JSON.parse(body);
};

/**
 * In-process stand-in for the gateway HTTP API. Pass `gateway.fetch` wherever a `fetchImpl` is
 * accepted.
 */
export class FakeGateway {
  readonly calls: RecordedCall[] = [];
  readonly sessions = new Set<string>();
  readonly appId: string;
  appToken: string;
  filterShape: 'list' | 'map';
  hosts: FakeHost[];
  /** When set, every request fails as if the network were down. */
  unreachable = false;
  /** When set, the login step answers `invalid_token`. */
  refuseAppToken = false;

  private readonly apiVersion: string;
  private readonly apiBaseUrl?: string;
  private readonly deviceName: string;
  private readonly entries = new Map<string, StoredEntry>();
  private challengeCounter = 0;
  private sessionCounter = 0;
  private currentChallenge = 'challenge-0';
  private pendingRejections = 0;

  constructor(options: FakeGatewayOptions = {}) {
    this.appId = options.appId ?? 'lanwarden.test';
    this.appToken = options.appToken ?? 'test-app-token';
    this.apiVersion = options.apiVersion ?? '8.2';
    this.apiBaseUrl = options.apiBaseUrl;
    this.deviceName = options.deviceName ?? 'Fake Gateway';
    this.filterShape = options.filterShape ?? 'list';
    this.hosts = options.hosts ?? [];
  }

  get apiRoot(): string {
    return `${this.apiBaseUrl ?? '/api/'}v${this.apiVersion.split('.')[0]}`;
  }

  /** Invalidates every open session, as a reboot or a competing login would. */
  revokeSessions() {
    this.sessions.clear();
  }

  /** The next `count` authenticated requests answer `auth_required` regardless of token. */
  rejectNextAuthenticated(count = 1) {
    this.pendingRejections += count;
  }

  seedBlock(mac: string, id?: string) {
    const upper = mac.toUpperCase();
    const entryId = id ?? `${upper}-blacklist`;
    this.entries.set(entryId, { id: entryId, mac: upper, type: 'blacklist', comment: 'seeded' });
  }

  blockedMacs(): string[] {
    return [...this.entries.values()]
      .filter((entry) => entry.type === 'blacklist')
      .map((entry) => entry.mac.toLowerCase())
      .sort();
  }

  count(method: string, path: string): number {
    return this.calls.filter((call) => call.method === method && call.path === path).length;
  }

  readonly fetch = async (input: string, init: RequestInit = {}): Promise<Response> => {
    const method = init.method ?? 'GET';
    const url = new URL(input);
    const token = headerValue(init.headers, AUTH_HEADER);
    const body = parseBody(init.body);
    this.calls.push({ method, path: url.pathname, token, body });

    if (this.unreachable) {
      throw new TypeError('fetch failed');
    }

    if (url.pathname === '/api_version') {
      return json(200, {
        api_version: this.apiVersion,
        device_name: this.deviceName,
        ...(this.apiBaseUrl ? { api_base_url: this.apiBaseUrl } : {})
      });
    }

    if (!url.pathname.startsWith(this.apiRoot)) {
      return fail(404, 'not_found');
    }
    const path = url.pathname.slice(this.apiRoot.length);

    if (path === '/login/' && method === 'GET') {
      this.challengeCounter += 1;
      this.currentChallenge = `challenge-${this.challengeCounter}`;
      const loggedIn = token !== undefined && this.sessions.has(token);
      return ok({ logged_in: loggedIn, challenge: this.currentChallenge });
    }

    if (path === '/login/session/' && method === 'POST') {
      return this.openSession(body);
    }

    if (this.pendingRejections > 0) {
      this.pendingRejections -= 1;
      return fail(403, 'auth_required', 'Authentication required');
    }
    if (!token || !this.sessions.has(token)) {
      return fail(403, 'auth_required', 'Authentication required');
    }

    if (path === '/system/' && method === 'GET') {
      return ok({ uptime: '1 day', uptime_val: 86400 });
    }
    if (path === '/lan/browser/pub/' && method === 'GET') {
      return ok(
        this.hosts.map((host) => ({
          primary_name: host.name,
          l2ident: { id: host.mac.toUpperCase(), type: 'mac_address' },
          active: host.active ?? true,
          access: host.access ?? true
        }))
      );
    }
    if (path === '/wifi/mac_filter/' && method === 'GET') {
      return ok(this.renderFilter());
    }
    if (path === '/wifi/mac_filter/' && method === 'POST') {
      return this.addEntry(body);
    }
    if (path.startsWith('/wifi/mac_filter/') && method === 'DELETE') {
      const id = decodeURIComponent(path.slice('/wifi/mac_filter/'.length));
      if (!this.entries.delete(id)) {
        return fail(404, 'noent', 'No such entry');
      }
      return ok();
    }

    return fail(404, 'not_found');
  };

  private openSession(body: unknown): Response {
    if (typeof body !== 'object' || body === null || !('password' in body) || !('app_id' in body)) {
      return fail(400, 'invalid_request');
    }
    if (this.refuseAppToken) {
      return fail(403, 'invalid_token', 'The app token is invalid or has been revoked');
    }
    if (body.app_id !== this.appId || body.password !== signChallenge(this.appToken, this.currentChallenge)) {
      return fail(403, 'invalid_token', 'The app token is invalid or has been revoked');
    }
    this.sessionCounter += 1;
    const sessionToken = `session-${this.sessionCounter}`;
    this.sessions.add(sessionToken);
    return ok({ session_token: sessionToken, challenge: this.currentChallenge, permissions: { settings: true } });
  }

  private addEntry(body: unknown): Response {
    if (typeof body !== 'object' || body === null || !('mac' in body) || typeof body.mac !== 'string') {
      return fail(400, 'invalid_request');
    }
    const type = 'type' in body && typeof body.type === 'string' ? body.type : 'blacklist';
    const comment = 'comment' in body && typeof body.comment === 'string' ? body.comment : undefined;
    const id = `${body.mac.toUpperCase()}-${type}`;
    if (this.entries.has(id)) {
      return fail(409, 'exists', 'Entry already exists');
    }
    this.entries.set(id, { id, mac: body.mac.toUpperCase(), type, comment });
    return ok({ id, mac: body.mac.toUpperCase(), type, comment });
  }

  private renderFilter(): unknown {
    const entries = [...this.entries.values()];
    if (this.filterShape === 'list') {
      return entries;
    }
    return Object.fromEntries(entries.map((entry) => [entry.mac, { id: entry.id, type: entry.type, comment: entry.comment }]));
  }
}
