import logger from '../utils/logger';

/**
 * Runs work after the response has been sent. Tasks are detached from the
 * caller; rejections are logged here and never reach the process.
 */
export class BackgroundTasks {
  private readonly inFlight = new Set<Promise<void>>();

  get pending(): number {
    return this.inFlight.size;
  }

  schedule(label: string, task: () => Promise<unknown> | void): void {
    const run = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          logger.warn({ err, task: label }, 'Background task failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  /** Resolves once every task scheduled so far, and any they schedule, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
