import type { z } from 'zod';
import type { CredentialStore } from '../credentials/credentialStore';
import { discoverGateway } from '../discovery';
import { AuthError, GatewayError, ProtocolError, SessionRejectedError, TransientNetworkError } from '../errors';
import { ApiRejectedError, type GatewayHttp, type GatewayRequest } from '../http';
import { logWithContext, sanitizeError, type SafeLogger } from '../logging';
import { challengeSchema, loginStatusSchema, sessionSchema, systemSchema } from '../schemas';
import type { GatewayEndpoint } from '../types';
import { signChallenge } from './signature';

export type SessionState = 'uninitialized' | 'connected' | 'disconnected' | 'degraded';

export interface SessionStatus {
  state: SessionState;
  reason?: string;
  origin?: string;
  apiVersion?: string;
  deviceName?: string;
  credentialPath?: string;
}

export type SessionResult = { ok: true; token: string } | { ok: false; error: GatewayError };

export interface AuthenticatedSession {
  endpoint: GatewayEndpoint;
  token: string;
}

export interface SessionManagerOptions {
  appId: string;
  /** Candidate gateway base URLs, most preferred first. */
  gatewayUrls: readonly string[];
  credentials: CredentialStore;
  http: GatewayHttp;
  logger?: SafeLogger;
}

/** Login error codes that mean the application token itself is unusable. */
const FATAL_LOGIN_CODES = new Set(['invalid_token', 'pending_token', 'denied_from_external_ip', 'insufficient_rights']);

const LOGIN_ATTEMPTS = 2;

const toGatewayError = (error: unknown): GatewayError => {
  if (error instanceof GatewayError) {
    return error;
  }
  return new ProtocolError('unexpected failure talking to gateway', undefined, error);
};

/**
 * Owns the challenge/response login against the gateway and the short-lived session token.
 * One instance per process, shared by every consumer that talks to the gateway.
 */
export class SessionManager {
  private state: SessionState = 'uninitialized';
  private reason?: string;
  private degradedBy?: AuthError;
  private appToken?: string;
  private sessionToken?: string;
  private endpoint?: GatewayEndpoint;
  private handshakeInFlight?: Promise<string>;

  constructor(private readonly options: SessionManagerOptions) {}

  /** Loads the application token. Throws {@link AuthError} and enters degraded mode when none is usable. */
  async initialize(): Promise<void> {
    try {
      const record = await this.options.credentials.load();
      this.appToken = record.app_token;
      this.sessionToken = record.session_token ?? undefined;
      this.state = 'disconnected';
      this.reason = undefined;
    } catch (error) {
      const authError = error instanceof AuthError ? error : new AuthError('credential store failed', undefined, error);
      this.degrade(authError);
      throw authError;
    }
  }

  async ensureValidSession(): Promise<SessionResult> {
    if (this.degradedBy) {
      return { ok: false, error: this.degradedBy };
    }

    try {
      if (!this.appToken) {
        await this.initialize();
      }
      const endpoint = await this.resolveEndpoint();
      if (this.sessionToken && (await this.probe(endpoint, this.sessionToken))) {
        this.markConnected();
        return { ok: true, token: this.sessionToken };
      }
      if (this.sessionToken) {
        logWithContext(this.options.logger, 'info', 'cached session rejected, renewing', {
          sessionToken: this.sessionToken
        });
        this.sessionToken = undefined;
      }
      return { ok: true, token: await this.handshake() };
    } catch (error) {
      const failure = toGatewayError(error);
      this.noteFailure(failure);
      return { ok: false, error: failure };
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      const system = await this.request({ method: 'GET', path: '/system/', schema: systemSchema });
      this.markConnected();
      logWithContext(this.options.logger, 'info', 'gateway connection established', {
        uptime: system.uptime_val ?? system.uptime
      });
      return true;
    } catch (error) {
      logWithContext(this.options.logger, 'warn', 'gateway connection test failed', { err: sanitizeError(error) });
      return false;
    }
  }

  /**
   * Runs an authenticated operation. A session rejected mid-operation (expired, or rotated by
   * another process) triggers exactly one re-handshake and one retry; a second rejection is
   * reported to the caller.
   */
  async withSession<T>(operation: (session: AuthenticatedSession) => Promise<T>): Promise<T> {
    if (this.degradedBy) {
      throw this.degradedBy;
    }

    try {
      if (!this.appToken) {
        await this.initialize();
      }
      const endpoint = await this.resolveEndpoint();
      const token = this.sessionToken ?? (await this.handshake());
      try {
        return await operation({ endpoint, token });
      } catch (error) {
        if (!(error instanceof SessionRejectedError)) {
          throw error;
        }
        logWithContext(this.options.logger, 'info', 'session rejected mid-operation, re-authenticating once', {
          sessionToken: token
        });
        this.dropToken(token);
      }

      const fresh = this.sessionToken ?? (await this.handshake());
      try {
        return await operation({ endpoint, token: fresh });
      } catch (error) {
        if (error instanceof SessionRejectedError) {
          this.dropToken(fresh);
        }
        throw error;
      }
    } catch (error) {
      this.noteFailure(toGatewayError(error));
      throw error;
    }
  }

  request<T>(request: Omit<GatewayRequest<T>, 'sessionToken'>): Promise<T> {
    return this.withSession(({ endpoint, token }) =>
      this.options.http.call(endpoint, { ...request, sessionToken: token })
    );
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  isDegraded(): boolean {
    return this.state === 'degraded';
  }

  status(): SessionStatus {
    return {
      state: this.state,
      reason: this.reason,
      origin: this.endpoint?.origin,
      apiVersion: this.endpoint?.apiVersion,
      deviceName: this.endpoint?.deviceName,
      credentialPath: this.options.credentials.location()
    };
  }

  private async resolveEndpoint(): Promise<GatewayEndpoint> {
    if (!this.endpoint) {
      this.endpoint = await discoverGateway(this.options.gatewayUrls, {
        http: this.options.http,
        logger: this.options.logger
      });
    }
    return this.endpoint;
  }

  private async probe(endpoint: GatewayEndpoint, token: string): Promise<boolean> {
    try {
      const status = await this.options.http.call(endpoint, {
        method: 'GET',
        path: '/login/',
        sessionToken: token,
        schema: loginStatusSchema
      });
      return status.logged_in !== false;
    } catch (error) {
      if (error instanceof SessionRejectedError) {
        return false;
      }
      throw error;
    }
  }

  private handshake(): Promise<string> {
    if (!this.handshakeInFlight) {
      this.handshakeInFlight = this.performHandshake().finally(() => {
        this.handshakeInFlight = undefined;
      });
    }
    return this.handshakeInFlight;
  }

  private async performHandshake(): Promise<string> {
    const appToken = this.appToken;
    if (!appToken) {
      throw new AuthError('application token not loaded');
    }
    const endpoint = await this.resolveEndpoint();
    const { credentials, logger } = this.options;
    const session = await this.openSession(endpoint, appToken, LOGIN_ATTEMPTS);

    this.sessionToken = session.session_token;
    this.markConnected();
    logWithContext(logger, 'info', 'gateway session opened', {
      sessionToken: session.session_token,
      permissions: session.permissions
    });
    await credentials.saveSessionToken(session.session_token);
    return session.session_token;
  }

  /**
   * Another client logging in between our challenge read and our answer rotates the challenge, and
   * the gateway then refuses the answer like a bad token. A refusal is only final once a freshly
   * read challenge is refused as well.
   */
  private async openSession(
    endpoint: GatewayEndpoint,
    appToken: string,
    attemptsLeft: number
  ): Promise<z.infer<typeof sessionSchema>> {
    const { http, appId, logger } = this.options;
    const { challenge } = await http.call(endpoint, { method: 'GET', path: '/login/', schema: challengeSchema });
    try {
      return await http.call(endpoint, {
        method: 'POST',
        path: '/login/session/',
        body: { app_id: appId, password: signChallenge(appToken, challenge) },
        schema: sessionSchema
      });
    } catch (error) {
      if (!(error instanceof ApiRejectedError) || !FATAL_LOGIN_CODES.has(error.apiCode)) {
        throw error;
      }
      if (attemptsLeft > 1) {
        logWithContext(logger, 'info', 'login refused, retrying with a fresh challenge', { apiCode: error.apiCode });
        return this.openSession(endpoint, appToken, attemptsLeft - 1);
      }
      throw new AuthError('gateway refused the application token', { apiCode: error.apiCode }, error);
    }
  }

  private dropToken(token: string) {
    if (this.sessionToken === token) {
      this.sessionToken = undefined;
    }
  }

  private markConnected() {
    if (this.state !== 'degraded') {
      this.state = 'connected';
      this.reason = undefined;
    }
  }

  private noteFailure(error: GatewayError) {
    if (error instanceof AuthError) {
      this.degrade(error);
      return;
    }
    if (error instanceof TransientNetworkError && this.state !== 'degraded') {
      this.state = 'disconnected';
      this.reason = error.message;
    }
  }

  private degrade(error: AuthError) {
    if (this.degradedBy) {
      return;
    }
    this.degradedBy = error;
    this.state = 'degraded';
    this.reason = error.message;
    this.sessionToken = undefined;
    logWithContext(this.options.logger, 'error', 'gateway enforcement disabled until credentials are fixed', {
      err: sanitizeError(error),
      metadata: error.metadata
    });
  }
}
