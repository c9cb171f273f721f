import { ConfigurationError } from "@gto-broker/shared";

export interface SlotPoolStats {
  size: number;
  active: number;
  queued: number;
}

function checkSize(size: number): number {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`solver.workerPoolSize must be an integer >= 1, received ${size}`, "solver.workerPoolSize");
  }
  return size;
}

/**
 * Bounds how many solver processes run at once. Callers beyond `size` wait
 * in FIFO order; a released slot passes straight to the next waiter.
 */
export class SlotPool {
  private active = 0;
  private capacity: number;
  private readonly waiting: Array<() => void> = [];

  constructor(size: number) {
    this.capacity = checkSize(size);
  }

  get size(): number {
    return this.capacity;
  }

  /**
   * Growing admits waiters at once. Shrinking never interrupts running
   * tasks; slots above the new size close as they are released.
   */
  resize(size: number): void {
    this.capacity = checkSize(size);
    while (this.active < this.capacity) {
      const next = this.waiting.shift();
      if (!next) {
        return;
      }
      this.active += 1;
      next();
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  stats(): SlotPoolStats {
    return { size: this.size, active: this.active, queued: this.waiting.length };
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    if (this.active <= this.capacity) {
      const next = this.waiting.shift();
      if (next) {
        next();
        return;
      }
    }
    this.active -= 1;
  }
}
