import { afterEach, describe, expect, it, vi } from 'vitest';
import { createReconcileRunner, type ReconcileRunner } from '../../app/runLoop';
import type { CycleReport } from '../../domain/services/reconciler';
import { createLogger } from '../../logging';

const report = (): CycleReport => ({
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:01.000Z',
  outcome: 'completed',
  scanned: 0,
  newDevices: 0,
  blocked: 0,
  allowed: 0,
  failures: 0,
  enforcementSkipped: false,
  driftChecked: false,
  driftCorrections: 0
});

describe('reconcile runner', () => {
  const logger = createLogger({ level: 'silent' });
  let runner: ReconcileRunner | undefined;

  afterEach(async () => {
    await runner?.stop();
    runner = undefined;
    vi.restoreAllMocks();
  });

  it('repeats cycles until stopped', async () => {
    const runCycle = vi.fn(async () => report());
    runner = createReconcileRunner({ runCycle }, { intervalMs: 5 }, logger);

    await runner.start();
    await expect.poll(() => runCycle.mock.calls.length).toBeGreaterThanOrEqual(3);
    await runner.stop();

    const settled = runCycle.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(runner.isRunning()).toBe(false);
    expect(runCycle.mock.calls.length).toBe(settled);
  });

  it('keeps looping after a cycle throws', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const runCycle = vi
      .fn<() => Promise<CycleReport>>()
      .mockRejectedValueOnce(new Error('registry offline'))
      .mockImplementation(async () => report());
    runner = createReconcileRunner({ runCycle }, { intervalMs: 5 }, logger);

    await runner.start();
    await expect.poll(() => runCycle.mock.calls.length).toBeGreaterThanOrEqual(2);

    expect(errorSpy).toHaveBeenCalledWith({ err: expect.any(Error) }, 'reconcile_cycle_failed');
  });

  it('cuts the pause short on stop', async () => {
    const runCycle = vi.fn(async () => report());
    runner = createReconcileRunner({ runCycle }, { intervalMs: 60_000 }, logger);

    await runner.start();
    await expect.poll(() => runCycle.mock.calls.length).toBe(1);

    const startedStop = Date.now();
    await runner.stop();

    expect(Date.now() - startedStop).toBeLessThan(1_000);
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it('ignores a second start', async () => {
    const runCycle = vi.fn(async () => report());
    runner = createReconcileRunner({ runCycle }, { intervalMs: 60_000 }, logger);

    await runner.start();
    await runner.start();
    await expect.poll(() => runCycle.mock.calls.length).toBe(1);

    expect(runner.isRunning()).toBe(true);
  });
});
