/**
 * Cancellable monitoring loop: run a cycle, wait, repeat until stopped
 */

import { EventEmitter } from 'events';
import { CycleReport } from './cycle';

export class Monitor extends EventEmitter {
  private running = false;
  private loop?: Promise<void>;
  private timer?: NodeJS.Timeout;
  private wake?: () => void;

  constructor(
    private readonly runOnce: () => Promise<CycleReport>,
    private readonly intervalMs: number
  ) {
    super();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the loop; emits 'cycle' with each report and 'cycleError' for failed cycles
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
    this.emit('started');
  }

  /**
   * Cancel the pending wait and resolve once the in-flight cycle has finished
   */
  async stop(): Promise<void> {
    if (!this.running) {
      await this.loop;
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.wake?.();
    await this.loop;
    this.emit('stopped');
  }

  /** Resolves when the loop exits */
  finished(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        const report = await this.runOnce();
        this.emit('cycle', report);
      } catch (error) {
        // A failed cycle is retried on the next tick
        this.emit('cycleError', error);
      }
      if (!this.running) break;
      await this.sleep(this.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = undefined;
        resolve();
      }, ms);
    });
  }
}
