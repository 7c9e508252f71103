import { ProtocolError, TransientNetworkError } from './errors';
import type { GatewayHttp } from './http';
import { logWithContext, sanitizeError, type SafeLogger } from './logging';
import { apiVersionSchema } from './schemas';
import type { GatewayEndpoint } from './types';

const DEFAULT_API_BASE = '/api/';

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, '');

export const buildEndpoint = (
  origin: string,
  info: { api_version: string; api_base_url?: string; device_name?: string }
): GatewayEndpoint => {
  const major = info.api_version.split('.')[0]?.trim() ?? '';
  if (!/^\d+$/.test(major)) {
    throw new ProtocolError('gateway reported an unusable api_version', { origin, apiVersion: info.api_version });
  }
  let base = info.api_base_url || DEFAULT_API_BASE;
  if (!base.startsWith('/')) base = `/${base}`;
  if (!base.endsWith('/')) base = `${base}/`;

  const apiVersion = `v${major}`;
  return {
    origin: trimTrailingSlash(origin),
    apiRoot: `${trimTrailingSlash(origin)}${base}${apiVersion}`,
    apiVersion,
    deviceName: info.device_name
  };
};

/**
 * Probes `/api_version` on each candidate base URL in order and returns the first gateway that
 * answers with a usable version.
 */
export const discoverGateway = async (
  candidates: readonly string[],
  { http, logger }: { http: GatewayHttp; logger?: SafeLogger }
): Promise<GatewayEndpoint> => {
  for (const candidate of candidates) {
    const origin = trimTrailingSlash(candidate);
    try {
      const info = await http.getJson(`${origin}/api_version`, apiVersionSchema);
      const endpoint = buildEndpoint(origin, info);
      logWithContext(logger, 'info', 'gateway discovered', {
        origin,
        apiVersion: endpoint.apiVersion,
        deviceName: endpoint.deviceName
      });
      return endpoint;
    } catch (error) {
      logWithContext(logger, 'debug', 'gateway candidate unavailable', { origin, err: sanitizeError(error) });
    }
  }

  throw new TransientNetworkError('no gateway answered on any candidate URL', { candidates: [...candidates] });
};
