import { z } from 'zod';
import { canonicalMac, displayMac, type Mac } from '../mac';
import { ApiRejectedError } from '../http';
import { logWithContext, type SafeLogger } from '../logging';
import { rawFilterListSchema, rawHostListSchema } from '../schemas';
import type { SessionManager } from '../session/sessionManager';
import type { AllowOutcome, BlockOutcome, FilterSet, LanHost } from '../types';
import { BLOCK_TYPE, blockEntriesFor, normalizeFilterList, normalizeHosts } from './filterList';

const FILTER_PATH = '/wifi/mac_filter/';
const HOSTS_PATH = '/lan/browser/pub/';

const ignoredResult = z.unknown();

/** Refusals that mean another writer got there first; the filter already holds what we wanted. */
const DUPLICATE_ENTRY_CODES = new Set(['exists', 'already_exists']);
const MISSING_ENTRY_CODES = new Set(['noent', 'not_found']);

const rejectedWith = (error: unknown, codes: Set<string>) => error instanceof ApiRejectedError && codes.has(error.apiCode);

export interface EnforcementClientOptions {
  session: Pick<SessionManager, 'request'>;
  logger?: SafeLogger;
  /** Comment attached to entries this process creates. */
  blockComment?: string;
}

export interface EnforcementClient {
  block(mac: string): Promise<BlockOutcome>;
  allow(mac: string): Promise<AllowOutcome>;
  listFilterEntries(): Promise<FilterSet>;
  listHosts(): Promise<LanHost[]>;
  lookupHostname(mac: string): Promise<string | undefined>;
}

/**
 * Applies block/allow decisions to the gateway's MAC filter. Every mutation reads the current
 * list first, so repeating a call converges instead of duplicating entries.
 */
export const createEnforcementClient = ({
  session,
  logger,
  blockComment = 'blocked by lanwarden'
}: EnforcementClientOptions): EnforcementClient => {
  const listFilterEntries = async (): Promise<FilterSet> => {
    const raw = await session.request({ method: 'GET', path: FILTER_PATH, schema: rawFilterListSchema });
    const { entries, skipped } = normalizeFilterList(raw);
    if (skipped > 0) {
      logWithContext(logger, 'warn', 'ignored malformed filter entries', { skipped });
    }
    return entries;
  };

  const listHosts = async (): Promise<LanHost[]> => {
    const raw = await session.request({ method: 'GET', path: HOSTS_PATH, schema: rawHostListSchema });
    return normalizeHosts(raw);
  };

  return {
    listFilterEntries,
    listHosts,

    async block(value) {
      const mac: Mac = canonicalMac(value);
      const existing = blockEntriesFor(await listFilterEntries(), mac);
      if (existing.length > 0) {
        logWithContext(logger, 'debug', 'device already blocked', { mac });
        return 'already_blocked';
      }

      try {
        await session.request({
          method: 'POST',
          path: FILTER_PATH,
          body: { mac: displayMac(mac), type: BLOCK_TYPE, comment: blockComment },
          schema: ignoredResult
        });
      } catch (error) {
        if (!rejectedWith(error, DUPLICATE_ENTRY_CODES)) {
          throw error;
        }
        logWithContext(logger, 'debug', 'device blocked concurrently', { mac });
        return 'already_blocked';
      }
      logWithContext(logger, 'info', 'device blocked on gateway', { mac });
      return 'applied';
    },

    async allow(value) {
      const mac: Mac = canonicalMac(value);
      const existing = blockEntriesFor(await listFilterEntries(), mac);
      if (existing.length === 0) {
        logWithContext(logger, 'debug', 'device already allowed', { mac });
        return 'already_allowed';
      }

      let removed = 0;
      for (const entry of existing) {
        try {
          await session.request({
            method: 'DELETE',
            path: `${FILTER_PATH}${encodeURIComponent(entry.id)}`,
            schema: ignoredResult
          });
          removed += 1;
        } catch (error) {
          if (!rejectedWith(error, MISSING_ENTRY_CODES)) {
            throw error;
          }
          logWithContext(logger, 'debug', 'filter entry already removed', { mac, id: entry.id });
        }
      }
      if (removed === 0) {
        return 'already_allowed';
      }
      logWithContext(logger, 'info', 'device unblocked on gateway', { mac, removed });
      return 'removed';
    },

    async lookupHostname(value) {
      const mac = canonicalMac(value);
      const hosts = await listHosts();
      return hosts.find((host) => host.mac === mac)?.hostname;
    }
  };
};
