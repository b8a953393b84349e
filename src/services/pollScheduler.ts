/**
 * Poll Scheduler
 *
 * Runs update cycles on a cancellable timer. The next timer is armed only
 * after the running cycle settles, so cycles never overlap, and its delay is
 * whatever the finished cycle asked for (short while a match is live).
 */

import type { SettingsProvider } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { Snapshot } from '../types/match.js';
import { toDelayMs } from '../util/pollInterval.js';
import type { CycleResult } from './updateCycle.js';

export interface PollSchedulerOptions {
  cycle: { run(): Promise<CycleResult> };
  /** Read after a failed cycle to pick the retry delay */
  settings: SettingsProvider;
  /** Called with every fresh snapshot; errors are logged */
  onSnapshot?: (snapshot: Snapshot) => Promise<void> | void;
}

export class PollScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private latest: Snapshot | null = null;
  private consecutiveFailures = 0;
  // Bumped by start() and stop(); a chain only reschedules while its own value is current
  private generation = 0;

  constructor(private readonly options: PollSchedulerOptions) {}

  /** Last snapshot of a successful cycle; kept across failed cycles */
  get latestSnapshot(): Snapshot | null {
    return this.latest;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Starts polling; the first cycle runs immediately, or as soon as a cycle
   * left running by an earlier stop() settles
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    const generation = ++this.generation;
    if (this.inFlight) {
      void this.inFlight.then(() => this.schedule(0, generation));
    } else {
      this.schedule(0, generation);
    }
  }

  /**
   * Cancels the pending timer and waits for an in-flight cycle to finish,
   * so the cache is never left half-merged.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  private schedule(delayMs: number, generation: number): void {
    if (!this.running || generation !== this.generation) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick(generation).finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    let delaySeconds: number;
    try {
      const result = await this.options.cycle.run();
      this.latest = result.snapshot;
      this.consecutiveFailures = 0;
      delaySeconds = result.nextIntervalSeconds;
      await this.notify(result.snapshot);
    } catch (err) {
      this.consecutiveFailures++;
      delaySeconds = this.options.settings().pollIntervalSeconds;
      logger.error({ err, consecutiveFailures: this.consecutiveFailures, retryInSeconds: delaySeconds }, 'update cycle failed, keeping last snapshot');
    }
    logger.debug({ delaySeconds }, 'next update scheduled');
    this.schedule(toDelayMs(delaySeconds), generation);
  }

  private async notify(snapshot: Snapshot): Promise<void> {
    if (!this.options.onSnapshot) return;
    try {
      await this.options.onSnapshot(snapshot);
    } catch (err) {
      logger.warn({ err }, 'snapshot listener failed');
    }
  }
}
