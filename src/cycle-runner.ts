// src/cycle-runner.ts

import Logger from './logger.js';
import { DEFAULT_CYCLE_INTERVAL_MS } from './constants/constants.js';
import { toError } from './errors.js';
import type {
  CycleRunnerOptions,
  CycleRunnerState,
  CycleRunnerStats,
  LoggerInstance,
} from './types/fieldbus-types.js';

/**
 * Drives bus and protocol cycles on a timer. Steps run in order each cycle;
 * a failing step is reported and the remaining steps still run.
 * The next cycle is scheduled only after the current one finished.
 */
class CycleRunner {
  public readonly id: string;
  private interval: number;
  private readonly steps: Array<() => Promise<unknown>>;
  private readonly onError?: (error: Error, stepIndex: number) => void;

  private stopped: boolean = true;
  private paused: boolean = false;
  private executionInProgress: boolean = false;
  private timerId: NodeJS.Timeout | null = null;
  private stats: CycleRunnerStats = {
    totalRuns: 0,
    totalErrors: 0,
    lastError: null,
    lastRunTime: null,
  };
  private readonly logger: LoggerInstance;

  constructor(options: CycleRunnerOptions) {
    const interval = options.interval ?? DEFAULT_CYCLE_INTERVAL_MS;
    if (!Number.isFinite(interval) || interval < 0) {
      throw new RangeError(`Cycle interval must be a non-negative number, got ${interval}`);
    }
    this.id = options.id ?? 'cycle';
    this.interval = interval;
    this.steps = options.steps;
    this.onError = options.onError;

    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger(`Cycle:${this.id}`);
    this.logger.setLevel(options.logLevel ?? 'warn');
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Runner already started');
      return;
    }
    this.stopped = false;
    this.paused = false;
    this.logger.info('Runner started', { id: this.id });
    this.scheduleNextRun(true);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.info('Runner stopped', { id: this.id });
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.logger.info('Runner paused', { id: this.id });
  }

  resume(): void {
    if (this.stopped || !this.paused) {
      this.logger.debug('Cannot resume runner - not paused or stopped', { id: this.id });
      return;
    }
    this.paused = false;
    this.logger.info('Runner resumed', { id: this.id });
    if (!this.timerId && !this.executionInProgress) {
      this.scheduleNextRun(true);
    }
  }

  /**
   * Runs every step once, in order.
   * @returns true when no step failed
   */
  async runOnce(): Promise<boolean> {
    this.executionInProgress = true;
    this.stats.totalRuns++;
    let success = true;
    try {
      for (let stepIndex = 0; stepIndex < this.steps.length; stepIndex++) {
        const step = this.steps[stepIndex];
        if (!step) continue;
        try {
          await step();
        } catch (err: unknown) {
          success = false;
          this.reportError(toError(err), stepIndex);
        }
      }
      this.stats.lastRunTime = Date.now();
      return success;
    } finally {
      this.executionInProgress = false;
    }
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  isPaused(): boolean {
    return this.paused;
  }

  setInterval(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Cycle interval must be a non-negative number, got ${ms}`);
    }
    this.interval = ms;
    this.logger.info('Interval updated', { id: this.id, interval: ms });
  }

  getState(): CycleRunnerState {
    return {
      stopped: this.stopped,
      paused: this.paused,
      inProgress: this.executionInProgress,
    };
  }

  getStats(): CycleRunnerStats {
    return { ...this.stats };
  }

  private scheduleNextRun(immediate: boolean = false): void {
    if (this.stopped) return;
    if (this.timerId) clearTimeout(this.timerId);

    this.timerId = setTimeout(
      () => {
        this.timerId = null;
        if (this.stopped || this.paused) return;
        this.tick().catch((err: unknown) => {
          this.logger.error('Cycle failed', { id: this.id, error: toError(err).message });
        });
      },
      immediate ? 0 : this.interval
    );
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } finally {
      this.scheduleNextRun();
    }
  }

  private reportError(error: Error, stepIndex: number): void {
    this.stats.totalErrors++;
    this.stats.lastError = error;
    this.logger.warn(`Cycle step ${stepIndex} failed: ${error.message}`, { id: this.id });
    try {
      this.onError?.(error, stepIndex);
    } catch (err: unknown) {
      this.logger.error('Cycle error handler failed', { id: this.id, error: toError(err).message });
    }
  }
}

export { CycleRunner };
