import type { DeviceRecord } from '../../domain/entities/device';
import type { DeviceRegistry } from '../../repositories/devicesRepo';

const byMac = (a: DeviceRecord, b: DeviceRecord) => a.mac.localeCompare(b.mac);

export const createInMemoryDeviceRegistry = (
  seed: DeviceRecord[] = [],
  now: () => Date = () => new Date()
): DeviceRegistry => {
  const devices = new Map<string, DeviceRecord>();
  seed.forEach((record) => devices.set(record.mac, { ...record }));

  const copy = (record: DeviceRecord | undefined) => (record ? { ...record } : null);

  return {
    async getStatus(mac) {
      return devices.get(mac)?.status ?? null;
    },
    async get(mac) {
      return copy(devices.get(mac));
    },
    async upsert(mac, status, comment) {
      const current = devices.get(mac);
      const timestamp = now();
      const record: DeviceRecord = {
        mac,
        status,
        firstSeen: current?.firstSeen ?? timestamp,
        lastSeen: timestamp,
        comment: comment ?? current?.comment ?? ''
      };
      devices.set(mac, record);
      return { ...record };
    },
    async touch(mac) {
      const current = devices.get(mac);
      if (!current) return null;
      const record = { ...current, lastSeen: now() };
      devices.set(mac, record);
      return { ...record };
    },
    async update(mac, patch) {
      const current = devices.get(mac);
      if (!current) return null;
      const record: DeviceRecord = {
        ...current,
        status: patch.status ?? current.status,
        comment: patch.comment ?? current.comment
      };
      devices.set(mac, record);
      return { ...record };
    },
    async remove(mac) {
      return devices.delete(mac);
    },
    async listAll() {
      return [...devices.values()].map((record) => ({ ...record })).sort(byMac);
    },
    async listByStatus(status) {
      return [...devices.values()]
        .filter((record) => record.status === status)
        .map((record) => ({ ...record }))
        .sort(byMac);
    }
  };
};
