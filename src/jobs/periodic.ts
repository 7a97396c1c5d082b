// src/jobs/periodic.ts
// Fixed-interval background work. The next tick is scheduled only after the
// current one settles, so ticks never overlap. A tick gets a signal that
// aborts on stop(); loops check it between items and return early.

import { createLogger } from '../logger.js';

const log = createLogger('jobs');

export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private running = false;
  private abort = new AbortController();

  constructor(
    readonly name: string,
    readonly intervalMs: number,
    private readonly fn: (signal: AbortSignal) => Promise<unknown>
  ) {}

  get started(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    this.schedule();
    log.info({ task: this.name, intervalMs: this.intervalMs }, 'task started');
  }

  /** Stop scheduling, abort the tick in progress and wait for its current item. */
  async stop(): Promise<void> {
    this.running = false;
    this.abort.abort();
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.current) await this.current;
    log.info({ task: this.name }, 'task stopped');
  }

  /** One tick; errors are logged, never thrown. */
  async runOnce(): Promise<void> {
    try {
      const result = await this.fn(this.abort.signal);
      log.debug({ task: this.name, result }, 'tick done');
    } catch (err) {
      log.error({ err, task: this.name }, 'tick failed');
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.runOnce().finally(() => {
        this.current = null;
        if (this.running) this.schedule();
      });
    }, this.intervalMs);
  }
}
