/**
 * Recurring background task.
 *
 * Runs `work` after an initial delay and then every `intervalMs`, scheduling
 * the next run only once the current one has settled. A failed run is
 * logged and retried on the next tick. stop() cancels the pending timer and
 * waits for an in-flight run to finish.
 */

import { describeError } from '../errors.js';
import { log } from '../logger.js';

export interface PeriodicTaskOptions {
  intervalMs: number;
  initialDelayMs: number;
}

export class PeriodicTask {
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private runs = 0;

  constructor(
    readonly name: string,
    private readonly options: PeriodicTaskOptions,
    private readonly work: () => Promise<void>,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get completedRuns(): number {
    return this.runs;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    log(`[${this.name}] Started, interval: ${formatMs(this.options.intervalMs)}, initial delay: ${formatMs(this.options.initialDelayMs)}`);
    this.scheduleNext(this.options.initialDelayMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log(`[${this.name}] Stopped`);
  }

  /** Run once now, outside the schedule. Never rejects. */
  runOnce(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => this.scheduleNext(this.options.intervalMs));
    }, delayMs);
  }

  private async execute(): Promise<void> {
    try {
      await this.work();
    } catch (err) {
      log(`[${this.name}] Run failed, will retry next tick: ${describeError(err)}`);
    } finally {
      this.runs++;
    }
  }
}

function formatMs(ms: number): string {
  if (ms >= 60_000 && ms % 60_000 === 0) return `${ms / 60_000}min`;
  if (ms >= 1_000 && ms % 1_000 === 0) return `${ms / 1_000}s`;
  return `${ms}ms`;
}
