import { logger } from '../observability/logger';

/**
 * Keeps track of follow-up work started after a response was flushed,
 * so shutdown can wait for it instead of dropping replies mid-flight.
 */
export class FollowUpTracker {
  private inFlight = new Set<Promise<void>>();
  private log = logger.child({ component: 'follow-up-tracker' });

  run(name: string, task: () => Promise<void>): void {
    const promise = task()
      .catch((err: unknown) => {
        this.log.error({ err, task: name }, 'Follow-up task failed');
      })
      .finally(() => {
        this.inFlight.delete(promise);
      });
    this.inFlight.add(promise);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every task started so far has settled */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
