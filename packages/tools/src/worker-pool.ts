/**
 * Bounded pool for tool executions
 *
 * A task runs under the identity that was bound when it was submitted,
 * not whichever identity happens to be active when a slot frees up.
 */

import type { RequestIdentityContext } from '@docdesk/auth';
import { logger } from '@docdesk/observability';

export class WorkerPool {
  private running = 0;
  private readonly queue: Array<() => void> = [];

  constructor(
    private readonly size: number,
    private readonly identity: RequestIdentityContext
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    const userId = this.identity.current();

    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.running++;
        void this.identity
          .run(userId, async () => task())
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.next();
          });
      };

      if (this.running < this.size) {
        start();
      } else {
        logger.debug('Worker pool saturated, queueing task', {
          active: this.running,
          queued: this.queue.length + 1,
        });
        this.queue.push(start);
      }
    });
  }

  private next(): void {
    const start = this.queue.shift();
    if (start) {
      start();
    }
  }
}
