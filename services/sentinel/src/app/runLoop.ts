import type { Logger } from 'pino';
import type { Reconciler } from '../domain/services/reconciler';

export interface ReconcileRunner {
  start(): Promise<void>;
  /** Resolves once the in-flight cycle, if any, has finished. */
  stop(): Promise<void>;
  isRunning(): boolean;
}

export const createReconcileRunner = (
  reconciler: Pick<Reconciler, 'runCycle'>,
  { intervalMs }: { intervalMs: number },
  logger: Logger
): ReconcileRunner => {
  let running = false;
  let loopPromise: Promise<void> | null = null;
  let timer: NodeJS.Timeout | undefined;
  let wake: (() => void) | undefined;

  const pause = () =>
    new Promise<void>((resolve) => {
      wake = resolve;
      timer = setTimeout(resolve, intervalMs);
    });

  const runLoop = async () => {
    while (running) {
      try {
        await reconciler.runCycle();
      } catch (error) {
        logger.error({ err: error }, 'reconcile_cycle_failed');
      }
      if (!running) break;
      await pause();
    }
  };

  return {
    async start() {
      if (running) {
        logger.warn('reconcile loop already running');
        return;
      }
      running = true;
      loopPromise = runLoop();
      logger.info({ intervalMs }, 'reconcile loop started');
    },

    async stop() {
      if (!running) return;
      running = false;
      clearTimeout(timer);
      wake?.();
      if (loopPromise) {
        await loopPromise;
      }
      logger.info('reconcile loop stopped');
    },

    isRunning: () => running
  };
};
