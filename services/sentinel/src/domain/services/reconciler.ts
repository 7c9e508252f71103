import type { Logger } from 'pino';
import { isBlacklisted, sanitizeError, type EnforcementClient, type SessionManager } from '@lanwarden/gateway';
import type { Notifier } from '../../adapters/notify/logNotifier';
import type { Scanner } from '../../adapters/scan/arpScan';
import type { DeviceRegistry } from '../../repositories/devicesRepo';
import { DriftError } from '../errors';
import type { CycleOutcome, SentinelMetrics } from '../metrics';
import { actionFor, intendedAccess, NEW_DEVICE_STATUS, type EnforcementAction } from '../policy';

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  outcome: CycleOutcome;
  scanned: number;
  newDevices: number;
  blocked: number;
  allowed: number;
  failures: number;
  enforcementSkipped: boolean;
  driftChecked: boolean;
  driftCorrections: number;
}

export interface ReconcilerDeps {
  registry: DeviceRegistry;
  scanner: Scanner;
  enforcement: EnforcementClient;
  session: Pick<SessionManager, 'ensureValidSession'>;
  notifier: Notifier;
  metrics: SentinelMetrics;
  logger: Logger;
  /** Run the drift check after every Nth completed cycle. */
  driftCheckEvery: number;
  now?: () => Date;
}

export interface Reconciler {
  runCycle(): Promise<CycleReport>;
  driftCheck(): Promise<number>;
  enforceBannedDevices(): Promise<number>;
  lastReport(): CycleReport | null;
  completedCycles(): number;
}

type Tally = Pick<CycleReport, 'newDevices' | 'blocked' | 'allowed' | 'failures'>;

export const createReconciler = ({
  registry,
  scanner,
  enforcement,
  session,
  notifier,
  metrics,
  logger,
  driftCheckEvery,
  now = () => new Date()
}: ReconcilerDeps): Reconciler => {
  let completed = 0;
  let last: CycleReport | null = null;

  const enforce = async (mac: string, action: EnforcementAction, tally: Tally): Promise<boolean> => {
    try {
      if (action === 'block') {
        const outcome = await enforcement.block(mac);
        metrics.recordEnforcement(action, outcome === 'applied' ? 'applied' : 'already');
        if (outcome === 'applied') tally.blocked += 1;
      } else {
        const outcome = await enforcement.allow(mac);
        metrics.recordEnforcement(action, outcome === 'removed' ? 'applied' : 'already');
        if (outcome === 'removed') tally.allowed += 1;
      }
      return true;
    } catch (error) {
      tally.failures += 1;
      metrics.recordEnforcement(action, 'failed');
      logger.error({ mac, action, err: sanitizeError(error) }, 'enforcement failed');
      return false;
    }
  };

  const hostnameOf = async (mac: string) => {
    try {
      return await enforcement.lookupHostname(mac);
    } catch (error) {
      logger.debug({ mac, err: sanitizeError(error) }, 'hostname lookup failed');
      return undefined;
    }
  };

  const reconcileDevice = async (mac: string, canEnforce: boolean, tally: Tally) => {
    const status = await registry.getStatus(mac);

    if (status === null) {
      await registry.upsert(mac, NEW_DEVICE_STATUS);
      tally.newDevices += 1;
      metrics.recordClassification('new', NEW_DEVICE_STATUS);
      let blocked = false;
      if (canEnforce) {
        blocked = await enforce(mac, actionFor(NEW_DEVICE_STATUS), tally);
      } else {
        metrics.recordEnforcement(actionFor(NEW_DEVICE_STATUS), 'skipped');
      }
      const hostname = canEnforce ? await hostnameOf(mac) : undefined;
      await notifier.newDevice({ mac, hostname, blocked, seenAt: now() });
      return;
    }

    metrics.recordClassification('known', status);
    if (canEnforce) {
      await enforce(mac, actionFor(status), tally);
    } else {
      metrics.recordEnforcement(actionFor(status), 'skipped');
    }
    await registry.touch(mac);
  };

  const driftCheck = async () => {
    const hosts = await enforcement.listHosts();
    const filter = await enforcement.listFilterEntries();
    const rows = await registry.listAll();
    const access = new Map(hosts.map((host) => [host.mac, host.access]));

    let corrections = 0;
    for (const row of rows) {
      const hostAccess = access.get(row.mac);
      if (hostAccess === undefined) {
        continue;
      }
      const actual = hostAccess && !isBlacklisted(filter, row.mac);
      const intended = intendedAccess(row.status);
      if (actual === intended) {
        continue;
      }

      const action = actionFor(row.status);
      try {
        const outcome = action === 'block' ? await enforcement.block(row.mac) : await enforcement.allow(row.mac);
        if (outcome === 'already_blocked' || outcome === 'already_allowed') {
          logger.debug({ mac: row.mac, status: row.status, actual }, 'access differs for reasons outside the MAC filter');
          continue;
        }
        const drift = new DriftError(row.mac, intended, actual);
        logger.warn({ ...drift.metadata, status: row.status }, drift.message);
        corrections += 1;
        metrics.recordDriftCorrection(action);
      } catch (error) {
        logger.error({ mac: row.mac, action, err: sanitizeError(error) }, 'drift correction failed');
      }
    }

    logger.info({ checked: rows.length, corrections }, 'drift check complete');
    return corrections;
  };

  const finish = (report: Omit<CycleReport, 'finishedAt'>, started: Date): CycleReport => {
    const finishedAt = now();
    const full: CycleReport = { ...report, finishedAt: finishedAt.toISOString() };
    metrics.recordCycle(full.outcome, finishedAt.getTime() - started.getTime());
    last = full;
    return full;
  };

  return {
    driftCheck,

    async runCycle() {
      const started = now();
      const report: Omit<CycleReport, 'finishedAt'> = {
        startedAt: started.toISOString(),
        outcome: 'completed',
        scanned: 0,
        newDevices: 0,
        blocked: 0,
        allowed: 0,
        failures: 0,
        enforcementSkipped: false,
        driftChecked: false,
        driftCorrections: 0
      };

      const scan = await scanner.scan();
      if (!scan.ok) {
        logger.warn({ reason: scan.failure.reason }, 'scan failed, cycle skipped');
        return finish({ ...report, outcome: 'scan_failed' }, started);
      }
      if (scan.macs.size === 0) {
        logger.warn('scan returned no devices, cycle skipped');
        return finish({ ...report, outcome: 'empty_scan' }, started);
      }
      report.scanned = scan.macs.size;

      const gate = await session.ensureValidSession();
      if (!gate.ok) {
        report.enforcementSkipped = true;
        logger.warn({ err: sanitizeError(gate.error) }, 'gateway session unavailable, enforcement skipped this cycle');
      }

      for (const mac of [...scan.macs].sort()) {
        try {
          await reconcileDevice(mac, gate.ok, report);
        } catch (error) {
          report.failures += 1;
          logger.error({ mac, err: sanitizeError(error) }, 'device reconciliation failed');
        }
      }

      completed += 1;
      if (completed % driftCheckEvery === 0) {
        if (gate.ok) {
          try {
            report.driftCorrections = await driftCheck();
            report.driftChecked = true;
          } catch (error) {
            logger.error({ err: sanitizeError(error) }, 'drift check failed');
          }
        } else {
          logger.info('drift check deferred until the gateway session is back');
        }
      }

      logger.info(
        { scanned: report.scanned, newDevices: report.newDevices, blocked: report.blocked, allowed: report.allowed, failures: report.failures },
        'cycle complete'
      );
      return finish(report, started);
    },

    async enforceBannedDevices() {
      const gate = await session.ensureValidSession();
      if (!gate.ok) {
        logger.warn({ err: sanitizeError(gate.error) }, 'initial sync of banned devices skipped');
        return 0;
      }
      const banned = await registry.listByStatus('banned');
      const tally: Tally = { newDevices: 0, blocked: 0, allowed: 0, failures: 0 };
      for (const device of banned) {
        await enforce(device.mac, 'block', tally);
      }
      logger.info({ banned: banned.length, applied: tally.blocked, failures: tally.failures }, 'banned devices synced');
      return tally.blocked;
    },

    lastReport: () => last,
    completedCycles: () => completed
  };
};
