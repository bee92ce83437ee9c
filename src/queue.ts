/**
 * Concurrency limiter for exchange processing (p-limit style), with a gate
 * that lets reconfiguration hold new work back while in-flight work drains.
 */
export class ConcurrencyLimiter {
  readonly concurrency: number;
  private running = 0;
  private pending: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error('Concurrency must be a positive integer');
    }
    this.concurrency = concurrency;
  }

  /**
   * Run an async function once a slot is free and the gate is open.
   * Resolves/rejects with the task result.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    while (this.gate || this.running >= this.concurrency) {
      if (this.gate) {
        await this.gate;
      } else {
        await new Promise<void>((resolve) => this.pending.push(resolve));
      }
    }

    this.running++;
    try {
      return await fn();
    } finally {
      this.running--;
      const next = this.pending.shift();
      if (next) next();
      if (this.running === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }

  /**
   * Wait until no task is running. Does not stop new tasks from starting;
   * use pause() for that.
   */
  async drain(): Promise<void> {
    if (this.running === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Hold back tasks that have not started yet. Running tasks continue.
   */
  pause(): void {
    if (this.gate) return;
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  resume(): void {
    const release = this.openGate;
    this.gate = null;
    this.openGate = null;
    if (release) release();
  }

  isPaused(): boolean {
    return this.gate !== null;
  }

  getRunning(): number {
    return this.running;
  }

  getPending(): number {
    return this.pending.length;
  }
}
