/**
 * Fixed-interval frame scheduler.
 *
 * Each iteration reads the clock, computes the delta since the previous
 * iteration, runs the tick and then waits before the next one. Under the
 * default `fixed-sleep` pacing the wait is always the full interval, so the
 * real rate drifts below the nominal one when ticks take time. `fixed-rate`
 * pacing waits only for the remainder of the interval.
 *
 * Ticks never overlap: the next wait is scheduled after the tick returns.
 */

import { NexError, describeError, type NexLogger } from '@nex/core';

import { systemFrameClock, type FrameClock } from './frame-clock.js';

export type FramePacing = 'fixed-sleep' | 'fixed-rate';

export type TickErrorPolicy = 'stop' | 'log-and-continue';

export type FrameTick = (deltaTime: number, frameNumber: number) => void;

export interface FrameSchedulerOptions {
  /** Wait between ticks in milliseconds. Default: 16 (~60 Hz). */
  intervalMs?: number;
  pacing?: FramePacing;
  /** `stop` rejects `run()` on a throwing tick; `log-and-continue` keeps going. */
  tickErrorPolicy?: TickErrorPolicy;
  clock?: FrameClock;
  logger?: NexLogger;
  /** Called for every tick error kept alive by `log-and-continue`. */
  onTickError?: (error: unknown, frameNumber: number) => void;
}

export const DEFAULT_FRAME_INTERVAL_MS = 16;

export class FrameSchedulerError extends NexError {
  constructor(message: string) {
    super(message);
    this.name = 'FrameSchedulerError';
  }
}

export class FrameScheduler {
  readonly intervalMs: number;
  readonly pacing: FramePacing;
  readonly tickErrorPolicy: TickErrorPolicy;

  private readonly clock: FrameClock;
  private readonly logger: NexLogger;
  private readonly onTickError: ((error: unknown, frameNumber: number) => void) | undefined;

  private frameNumber = 0;
  private running = false;
  private stopCurrentRun: ((reason: string) => void) | null = null;

  constructor(options: FrameSchedulerOptions = {}) {
    const intervalMs = options.intervalMs ?? DEFAULT_FRAME_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new FrameSchedulerError(`Frame interval must be a positive number of milliseconds (got ${intervalMs})`);
    }
    this.intervalMs = intervalMs;
    this.pacing = options.pacing ?? 'fixed-sleep';
    this.tickErrorPolicy = options.tickErrorPolicy ?? 'stop';
    this.clock = options.clock ?? systemFrameClock;
    this.logger = options.logger ?? console;
    this.onTickError = options.onTickError;
  }

  getFrameNumber(): number {
    return this.frameNumber;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run ticks until `signal` aborts or `stop()` is called; both resolve the
   * returned promise. The first tick fires one interval after the call.
   */
  run(tick: FrameTick, signal?: AbortSignal): Promise<void> {
    if (this.running) {
      return Promise.reject(new FrameSchedulerError('Frame scheduler is already running'));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let cancelWait: (() => void) | null = null;
      let lastTime = this.clock.now();

      this.running = true;
      this.frameNumber = 0;

      const finish = (failure?: { error: unknown }): void => {
        if (settled) {
          return;
        }
        settled = true;
        cancelWait?.();
        cancelWait = null;
        signal?.removeEventListener('abort', onAbort);
        this.running = false;
        this.stopCurrentRun = null;
        if (failure) {
          reject(failure.error);
        } else {
          resolve();
        }
      };

      const stopWith = (reason: string): void => {
        this.logger.info(`[FrameScheduler] ${reason}`);
        finish();
      };

      const onAbort = (): void => stopWith('Stopped by user');

      const step = (): void => {
        cancelWait = null;
        const currentTime = this.clock.now();
        const deltaTime = (currentTime - lastTime) / 1000;
        lastTime = currentTime;

        const frameNumber = this.frameNumber;
        this.frameNumber += 1;
        try {
          tick(deltaTime, frameNumber);
        } catch (error) {
          this.logger.error(`[FrameScheduler] Tick ${frameNumber} failed: ${describeError(error)}`);
          if (this.tickErrorPolicy === 'stop') {
            finish({ error });
            return;
          }
          this.onTickError?.(error, frameNumber);
        }

        if (settled) {
          return;
        }

        const waitMs = this.pacing === 'fixed-rate'
          ? Math.max(0, this.intervalMs - (this.clock.now() - currentTime))
          : this.intervalMs;
        cancelWait = this.clock.schedule(step, waitMs);
      };

      this.stopCurrentRun = stopWith;

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      cancelWait = this.clock.schedule(step, this.intervalMs);
    });
  }

  /** End the current run, if any. */
  stop(): void {
    this.stopCurrentRun?.('Stopped');
  }
}
