/**
 * Background task group
 *
 * Tasks spawned here run detached from the request that started them.
 * A task that throws is logged, never rejected to the caller.
 */

import { Logger, errorMeta } from '@lnurl-wallet/core';

export class TaskGroup {
  private running = new Set<Promise<void>>();

  constructor(private logger: Logger = new Logger({ serviceName: 'lnurl-wallet:tasks' })) {}

  spawn(label: string, task: () => Promise<void>): void {
    const promise = task()
      .catch((error: unknown) => {
        this.logger.error('Background task failed', { task: label, ...errorMeta(error) });
      })
      .finally(() => {
        this.running.delete(promise);
      });
    this.running.add(promise);
  }

  get size(): number {
    return this.running.size;
  }

  /**
   * Resolve once every task running now (and any they spawn) has finished.
   */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
