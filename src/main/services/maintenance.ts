/**
 * Periodic cache maintenance.
 * Runs the expiry sweep at startup and then on a fixed interval.
 */
import type { MaintenanceReport } from '@shared/domain';
import type { Result } from '@shared/errors';
import { createLogger, toError } from '../logger';

const logger = createLogger('maintenance');

export type MaintenanceTask = () => Promise<Result<MaintenanceReport>>;

export class MaintenanceScheduler {
  private readonly task: MaintenanceTask;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<Result<MaintenanceReport>> | null = null;

  constructor(task: MaintenanceTask) {
    this.task = task;
  }

  /**
   * Run one sweep. A call while a sweep is in progress joins that sweep.
   */
  runOnce(): Promise<Result<MaintenanceReport>> {
    if (this.running !== null) return this.running;
    const run = this.task()
      .then((result) => {
        if (result.ok) {
          logger.info(
            `Maintenance removed ${String(result.value.expiredFiles)} files and ${String(result.value.expiredThreads)} threads`,
          );
        } else {
          logger.warn(`Maintenance failed: ${result.error.message}`);
        }
        return result;
      })
      .finally(() => {
        this.running = null;
      });
    this.running = run;
    return run;
  }

  start(intervalSeconds: number): void {
    this.stop();
    this.timer = setInterval(() => {
      void this.runOnce().catch((err: unknown) => {
        logger.error('Maintenance sweep threw', toError(err));
      });
    }, intervalSeconds * 1000);
    // Never keeps the process alive on its own
    this.timer.unref();
    logger.info(`Maintenance timer started: every ${String(intervalSeconds)} seconds`);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Maintenance timer stopped');
    }
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }
}
