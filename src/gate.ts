import { logger } from './logger.js';

export type Permit = {
  release(): void;
};

export type RateGateOptions = {
  maxConcurrent?: number;
  delayMs?: number;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Bounds outstanding requests to `maxConcurrent` and spaces request starts
 * at least `delayMs` apart, in acquisition order.
 */
export class RateGate {
  readonly maxConcurrent: number;
  readonly delayMs: number;

  private active = 0;
  private waiters: Array<() => void> = [];
  private lastStart: number | null = null;
  private spacing: Promise<void> = Promise.resolve();

  constructor(options: RateGateOptions = {}) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 5);
    this.delayMs = Math.max(0, options.delayMs ?? 500);
  }

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<Permit> {
    await this.takeSlot();
    await this.awaitTurn();

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.releaseSlot();
      },
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const permit = await this.acquire();
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  private takeSlot(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    // the slot is handed over directly by releaseSlot, so active stays put
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private releaseSlot() {
    const next = this.waiters.shift();
    if (next) next();
    else this.active--;
  }

  // Check-sleep-update of lastStart, one caller at a time.
  private awaitTurn(): Promise<void> {
    const turn = this.spacing.then(async () => {
      if (this.lastStart !== null) {
        const elapsed = Date.now() - this.lastStart;
        if (elapsed < this.delayMs) {
          const wait = this.delayMs - elapsed;
          logger.debug(`Rate limiting: sleeping for ${(wait / 1000).toFixed(2)}s`);
          await sleep(wait);
        }
      }
      this.lastStart = Date.now();
    });
    this.spacing = turn;
    return turn;
  }
}
