import type { Logger } from 'pino';
import { canonicalMac, sanitizeError, type EnforcementClient, type SessionManager } from '@lanwarden/gateway';
import type { DeviceRecord, DeviceStatus } from '../entities/device';
import { NotFoundError } from '../errors';
import type { SentinelMetrics } from '../metrics';
import { actionFor } from '../policy';
import type { DevicePatch, DeviceRegistry } from '../../repositories/devicesRepo';

/** `deferred`: the gateway was unavailable; the next cycle or drift check applies the policy. */
export type EnforcementState = 'applied' | 'unchanged' | 'deferred' | 'failed';

export interface PolicyChange {
  device: DeviceRecord;
  enforcement: EnforcementState;
}

export interface PolicyServiceDeps {
  registry: DeviceRegistry;
  enforcement: EnforcementClient;
  session: Pick<SessionManager, 'ensureValidSession'>;
  metrics: SentinelMetrics;
  logger: Logger;
}

export const createPolicyService = ({ registry, enforcement, session, metrics, logger }: PolicyServiceDeps) => {
  const enforceNow = async (mac: string, status: DeviceStatus): Promise<EnforcementState> => {
    const gate = await session.ensureValidSession();
    if (!gate.ok) {
      logger.info({ mac, err: sanitizeError(gate.error) }, 'policy stored, enforcement deferred');
      return 'deferred';
    }
    const action = actionFor(status);
    try {
      const outcome = action === 'block' ? await enforcement.block(mac) : await enforcement.allow(mac);
      const changed = outcome === 'applied' || outcome === 'removed';
      metrics.recordEnforcement(action, changed ? 'applied' : 'already');
      return changed ? 'applied' : 'unchanged';
    } catch (error) {
      metrics.recordEnforcement(action, 'failed');
      logger.error({ mac, action, err: sanitizeError(error) }, 'policy enforcement failed');
      return 'failed';
    }
  };

  return {
    async list(status?: DeviceStatus) {
      return status ? registry.listByStatus(status) : registry.listAll();
    },

    async get(rawMac: string) {
      const device = await registry.get(canonicalMac(rawMac));
      if (!device) {
        throw new NotFoundError();
      }
      return device;
    },

    async setPolicy(rawMac: string, status: DeviceStatus, comment?: string): Promise<PolicyChange> {
      const mac = canonicalMac(rawMac);
      const device = await registry.upsert(mac, status, comment);
      logger.info({ mac, status }, 'policy set');
      return { device, enforcement: await enforceNow(mac, status) };
    },

    async patch(rawMac: string, patch: DevicePatch): Promise<PolicyChange> {
      const mac = canonicalMac(rawMac);
      const before = await registry.get(mac);
      const device = before ? await registry.update(mac, patch) : null;
      if (!before || !device) {
        throw new NotFoundError();
      }
      if (device.status === before.status) {
        return { device, enforcement: 'unchanged' };
      }
      logger.info({ mac, from: before.status, to: device.status }, 'policy changed');
      return { device, enforcement: await enforceNow(mac, device.status) };
    },

    async remove(rawMac: string) {
      const mac = canonicalMac(rawMac);
      if (!(await registry.remove(mac))) {
        throw new NotFoundError();
      }
      logger.info({ mac }, 'device removed from registry');
    }
  };
};

export type PolicyService = ReturnType<typeof createPolicyService>;
