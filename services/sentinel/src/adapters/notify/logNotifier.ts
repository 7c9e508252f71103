import type { Logger } from 'pino';

export interface NewDeviceEvent {
  mac: string;
  hostname?: string;
  blocked: boolean;
  seenAt: Date;
}

/** Outbound alerting lives outside this process; the notifier is the seam it plugs into. */
export interface Notifier {
  newDevice(event: NewDeviceEvent): Promise<void>;
}

export const createLogNotifier = (logger: Logger): Notifier => ({
  async newDevice(event) {
    logger.warn(
      { mac: event.mac, hostname: event.hostname, blocked: event.blocked, seenAt: event.seenAt.toISOString() },
      'new device quarantined'
    );
  }
});
