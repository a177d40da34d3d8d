/**
 * Tracks fire-and-forget work so it can be awaited in tests and at shutdown
 */

import { logger } from './logger.js';

export interface BackgroundTask {
  name: string;
  /** Settles when the task finishes; never rejects */
  done: Promise<void>;
}

export class BackgroundSupervisor {
  private active = new Set<Promise<void>>();

  get activeCount(): number {
    return this.active.size;
  }

  spawn(name: string, task: () => Promise<void>): BackgroundTask {
    const done = Promise.resolve()
      .then(task)
      .catch(error => {
        logger.error('BackgroundSupervisor', `Background task ${name} failed`, error);
      })
      .finally(() => {
        this.active.delete(done);
      });

    this.active.add(done);
    return { name, done };
  }

  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active]);
    }
  }
}
