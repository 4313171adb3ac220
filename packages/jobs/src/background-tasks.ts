import { describeError, silentLogger, type Logger } from '@voxq/shared';

/**
 * Fire-and-forget work queue for effects that must happen but are not part of the
 * caller's response, such as dropping a job record after its artifact was deleted.
 *
 * Tasks start on the next turn of the event loop. Failures are logged and never reach
 * the caller; `drain()` waits for everything enqueued so far (tests, shutdown).
 */
export class BackgroundTaskQueue {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger.child({ component: 'background-tasks' });
  }

  enqueue(name: string, task: () => void | Promise<void>): void {
    const run = this.run(name, task);
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
  }

  /** Number of tasks not yet settled. */
  get size(): number {
    return this.inFlight.size;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async run(name: string, task: () => void | Promise<void>): Promise<void> {
    await new Promise<void>(resolve => setImmediate(resolve));
    try {
      await task();
      this.logger.debug('Background task finished', { task: name });
    } catch (error) {
      this.logger.error('Background task failed', { task: name, ...describeError(error) });
    }
  }
}
