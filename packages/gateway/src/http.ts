import type { z } from 'zod';
import { ProtocolError, SessionRejectedError, TransientNetworkError } from './errors';
import { logWithContext, type SafeLogger } from './logging';
import { envelopeSchema, type ApiEnvelope } from './schemas';
import type { FetchLike, GatewayEndpoint } from './types';

export const AUTH_HEADER = 'X-Fbx-App-Auth';

const SESSION_REJECTED_CODES = new Set(['auth_required', 'invalid_session']);

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface GatewayRequest<T> {
  method: HttpMethod;
  path: string;
  body?: unknown;
  sessionToken?: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/** The gateway answered with `success: false` and an error code that is not a session rejection. */
export class ApiRejectedError extends ProtocolError {
  constructor(
    public readonly apiCode: string,
    message: string,
    metadata?: Record<string, unknown>
  ) {
    super(message, { ...metadata, apiCode });
    this.name = 'ApiRejectedError';
  }
}

export interface GatewayHttpOptions {
  fetchImpl?: FetchLike;
  timeoutMs: number;
  logger?: SafeLogger;
}

export interface GatewayHttp {
  getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  call<T>(endpoint: GatewayEndpoint, request: GatewayRequest<T>): Promise<T>;
}

const isAbort = (error: unknown) =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

export const createGatewayHttp = ({ fetchImpl = fetch, timeoutMs, logger }: GatewayHttpOptions): GatewayHttp => {
  const send = async (url: string, init: RequestInit): Promise<Response> => {
    try {
      return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (isAbort(error)) {
        throw new TransientNetworkError('gateway request timed out', { url, timeoutMs }, error);
      }
      throw new TransientNetworkError('gateway request failed', { url }, error);
    }
  };

  const readJson = async (response: Response, url: string): Promise<unknown> => {
    try {
      return await response.json();
    } catch (error) {
      if (isAbort(error)) {
        throw new TransientNetworkError('gateway response timed out', { url, timeoutMs }, error);
      }
      if (response.status >= 500) {
        throw new TransientNetworkError('gateway server error', { url, status: response.status }, error);
      }
      throw new ProtocolError('gateway returned a non-JSON body', { url, status: response.status }, error);
    }
  };

  const parseResult = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, url: string): T => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ProtocolError('gateway response has an unexpected shape', { url, issues: parsed.error.issues.length }, parsed.error);
    }
    return parsed.data;
  };

  const rejectEnvelope = (envelope: ApiEnvelope, status: number, url: string): never => {
    const apiCode = envelope.error_code ?? 'unknown';
    const message = envelope.msg ?? `gateway refused request (${apiCode})`;
    if (status === 403 && !envelope.error_code) {
      throw new SessionRejectedError(message, { url, status });
    }
    if (SESSION_REJECTED_CODES.has(apiCode)) {
      throw new SessionRejectedError(message, { url, status, apiCode });
    }
    if (status >= 500) {
      throw new TransientNetworkError(message, { url, status, apiCode });
    }
    throw new ApiRejectedError(apiCode, message, { url, status });
  };

  return {
    async getJson(url, schema) {
      const response = await send(url, { method: 'GET', headers: { accept: 'application/json' } });
      if (response.status >= 500) {
        throw new TransientNetworkError('gateway server error', { url, status: response.status });
      }
      return parseResult(schema, await readJson(response, url), url);
    },

    async call(endpoint, request) {
      const url = `${endpoint.apiRoot}${request.path}`;
      const headers: Record<string, string> = { accept: 'application/json' };
      if (request.sessionToken) {
        headers[AUTH_HEADER] = request.sessionToken;
      }
      const init: RequestInit = { method: request.method, headers };
      if (request.body !== undefined) {
        headers['content-type'] = 'application/json';
        init.body = JSON.stringify(request.body);
      }

      logWithContext(logger, 'debug', 'gateway request', { method: request.method, path: request.path });
      const response = await send(url, init);
      const payload = await readJson(response, url);
      const envelope = envelopeSchema.safeParse(payload);
      if (!envelope.success) {
        if (response.status >= 500) {
          throw new TransientNetworkError('gateway server error', { url, status: response.status });
        }
        throw new ProtocolError('gateway response is not an API envelope', { url, status: response.status }, envelope.error);
      }

      if (!envelope.data.success || response.status === 403) {
        return rejectEnvelope(envelope.data, response.status, url);
      }

      return parseResult(request.schema, envelope.data.result, url);
    }
  };
};
