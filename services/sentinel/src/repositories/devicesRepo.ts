import type { DeviceRecord, DeviceStatus } from '../domain/entities/device';

export interface DevicePatch {
  status?: DeviceStatus;
  comment?: string;
}

/**
 * Durable policy store keyed by canonical MAC. Each operation is a single statement; concurrent
 * writers from other processes are expected.
 */
export interface DeviceRegistry {
  getStatus(mac: string): Promise<DeviceStatus | null>;
  get(mac: string): Promise<DeviceRecord | null>;
  /** Creates or updates. Keeps `firstSeen` and, unless given, the comment; always refreshes `lastSeen`. */
  upsert(mac: string, status: DeviceStatus, comment?: string): Promise<DeviceRecord>;
  /** Refreshes `lastSeen` only. */
  touch(mac: string): Promise<DeviceRecord | null>;
  update(mac: string, patch: DevicePatch): Promise<DeviceRecord | null>;
  remove(mac: string): Promise<boolean>;
  listAll(): Promise<DeviceRecord[]>;
  listByStatus(status: DeviceStatus): Promise<DeviceRecord[]>;
}
