import type { Mac } from './mac';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GatewayEndpoint {
  origin: string;
  /** `{origin}{api_base_url}v{major}`; request paths are appended to it. */
  apiRoot: string;
  apiVersion: string;
  deviceName?: string;
}

export interface FilterEntry {
  id: string;
  mac: Mac;
  type: string;
  comment?: string;
  hostname?: string;
}

/** Filter entries grouped by canonical MAC, whatever shape the gateway sent. */
export type FilterSet = Map<Mac, FilterEntry[]>;

export interface LanHost {
  mac: Mac;
  hostname?: string;
  active: boolean;
  access: boolean;
}

export type BlockOutcome = 'applied' | 'already_blocked';
export type AllowOutcome = 'removed' | 'already_allowed';

export interface CredentialRecord {
  app_token: string;
  session_token?: string | null;
  created_at?: string;
  [key: string]: unknown;
}
