import { availableParallelism } from 'os';
import { Semaphore } from 'async-mutex';

export type WorkUnit<T> = () => Promise<T>;

export function defaultConcurrency(): number {
  return 2 * availableParallelism();
}

/**
 * Bounded pool for one batch of independent units. Units past the limit wait on the
 * semaphore; a unit that rejects never interrupts the ones already running.
 */
export class WorkerPool {
  private readonly semaphore: Semaphore;
  private active = 0;
  private peak = 0;

  constructor(public readonly limit: number = defaultConcurrency()) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.semaphore = new Semaphore(limit);
  }

  get activeCount(): number {
    return this.active;
  }

  get peakActiveCount(): number {
    return this.peak;
  }

  /**
   * Runs every unit and settles once all of them have finished. Results keep submission order.
   */
  async runAll<T>(units: WorkUnit<T>[]): Promise<PromiseSettledResult<T>[]> {
    return Promise.allSettled(units.map((unit) => this.semaphore.runExclusive(() => this.track(unit))));
  }

  private async track<T>(unit: WorkUnit<T>): Promise<T> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      return await unit();
    } finally {
      this.active--;
    }
  }
}
