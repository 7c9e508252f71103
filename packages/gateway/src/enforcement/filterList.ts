import { displayMac, tryCanonicalMac, type Mac } from '../mac';
import { filterEntryInfoSchema, filterEntrySchema, lanHostSchema } from '../schemas';
import type { FilterEntry, FilterSet, LanHost } from '../types';

export const BLOCK_TYPE = 'blacklist';

export interface NormalizedFilterList {
  entries: FilterSet;
  skipped: number;
}

const add = (set: FilterSet, entry: FilterEntry) => {
  const existing = set.get(entry.mac);
  if (!existing) {
    set.set(entry.mac, [entry]);
    return;
  }
  if (!existing.some((candidate) => candidate.id === entry.id)) {
    existing.push(entry);
  }
};

const fromSequence = (items: unknown[], set: FilterSet) => {
  let skipped = 0;
  for (const item of items) {
    const parsed = filterEntrySchema.safeParse(item);
    const mac = parsed.success ? tryCanonicalMac(parsed.data.mac) : undefined;
    if (!parsed.success || !mac) {
      skipped += 1;
      continue;
    }
    const type = parsed.data.type ?? BLOCK_TYPE;
    add(set, {
      id: parsed.data.id ?? `${displayMac(mac)}-${type}`,
      mac,
      type,
      comment: parsed.data.comment,
      hostname: parsed.data.hostname
    });
  }
  return skipped;
};

const fromMapping = (mapping: Record<string, unknown>, set: FilterSet) => {
  let skipped = 0;
  for (const [key, value] of Object.entries(mapping)) {
    const mac = tryCanonicalMac(key);
    if (!mac) {
      skipped += 1;
      continue;
    }
    const info = filterEntryInfoSchema.safeParse(value);
    const details = info.success ? info.data : {};
    const type = details.type ?? (typeof value === 'string' ? value : BLOCK_TYPE);
    add(set, {
      id: details.id ?? `${displayMac(mac)}-${type}`,
      mac,
      type,
      comment: details.comment,
      hostname: details.hostname
    });
  }
  return skipped;
};

/**
 * The filter endpoint has been seen returning both a list of entries and an object keyed by MAC.
 * Both collapse to the same set, keyed by canonical MAC.
 */
export const normalizeFilterList = (raw: unknown[] | Record<string, unknown> | null | undefined): NormalizedFilterList => {
  const entries: FilterSet = new Map();
  if (!raw) {
    return { entries, skipped: 0 };
  }
  const skipped = Array.isArray(raw) ? fromSequence(raw, entries) : fromMapping(raw, entries);
  return { entries, skipped };
};

export const blockEntriesFor = (entries: FilterSet, mac: Mac): FilterEntry[] =>
  (entries.get(mac) ?? []).filter((entry) => entry.type === BLOCK_TYPE);

export const isBlacklisted = (entries: FilterSet, mac: Mac) => blockEntriesFor(entries, mac).length > 0;

export const normalizeHosts = (raw: unknown[] | null | undefined): LanHost[] => {
  const hosts: LanHost[] = [];
  for (const item of raw ?? []) {
    const parsed = lanHostSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }
    const mac = tryCanonicalMac(parsed.data.l2ident?.id);
    if (!mac) {
      continue;
    }
    hosts.push({
      mac,
      hostname: parsed.data.primary_name,
      active: parsed.data.active ?? false,
      access: parsed.data.access ?? true
    });
  }
  return hosts;
};
