import { z } from 'zod';

export const DEVICE_STATUSES = ['authorized', 'quarantine', 'banned'] as const;

export const DeviceStatusSchema = z.enum(DEVICE_STATUSES);

export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export interface DeviceRecord {
  /** Canonical lowercase colon-separated MAC. */
  mac: string;
  status: DeviceStatus;
  firstSeen: Date;
  lastSeen: Date;
  comment: string;
}

export const isDeviceStatus = (value: unknown): value is DeviceStatus => DeviceStatusSchema.safeParse(value).success;
