import type { DeviceStatus } from './entities/device';

export type EnforcementAction = 'block' | 'allow';

/** Status given to a MAC the registry has never seen. Not configurable. */
export const NEW_DEVICE_STATUS: DeviceStatus = 'quarantine';

const ACTIONS: Readonly<Record<DeviceStatus, EnforcementAction>> = {
  quarantine: 'block',
  banned: 'block',
  authorized: 'allow'
};

export const actionFor = (status: DeviceStatus): EnforcementAction => ACTIONS[status];

export const intendedAccess = (status: DeviceStatus): boolean => actionFor(status) === 'allow';
