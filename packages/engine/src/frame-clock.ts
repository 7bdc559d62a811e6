/**
 * Time source and timer used by the frame scheduler.
 */
export interface FrameClock {
  /** Monotonic time in milliseconds. */
  now(): number;
  /** Run `callback` once after `delayMs`; the returned function cancels it. */
  schedule(callback: () => void, delayMs: number): () => void;
}

export const systemFrameClock: FrameClock = {
  now: () => performance.now(),
  schedule: (callback, delayMs) => {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};

interface PendingTimer {
  id: number;
  dueAt: number;
  callback: () => void;
}

/**
 * Clock that only moves when told to. Used for headless stepping and tests.
 */
export class ManualFrameClock implements FrameClock {
  private timestamp: number;
  private nextId = 1;
  private pending: PendingTimer[] = [];

  constructor(startMs = 0) {
    this.timestamp = startMs;
  }

  now(): number {
    return this.timestamp;
  }

  schedule(callback: () => void, delayMs: number): () => void {
    const timer: PendingTimer = {
      id: this.nextId,
      dueAt: this.timestamp + Math.max(0, delayMs),
      callback,
    };
    this.nextId += 1;
    this.pending.push(timer);
    return () => {
      this.pending = this.pending.filter((entry) => entry.id !== timer.id);
    };
  }

  /** Move time forward without firing timers (simulates work inside a tick). */
  spend(elapsedMs: number): void {
    this.timestamp += elapsedMs;
  }

  /** Move time forward, firing every timer that falls due on the way. */
  advance(elapsedMs: number): void {
    const target = this.timestamp + elapsedMs;
    for (;;) {
      const next = this.nextDue();
      if (!next || next.dueAt > target) {
        break;
      }
      this.pending = this.pending.filter((entry) => entry.id !== next.id);
      this.timestamp = Math.max(this.timestamp, next.dueAt);
      next.callback();
    }
    this.timestamp = Math.max(this.timestamp, target);
  }

  getPendingCount(): number {
    return this.pending.length;
  }

  private nextDue(): PendingTimer | undefined {
    let earliest: PendingTimer | undefined;
    for (const timer of this.pending) {
      if (!earliest || timer.dueAt < earliest.dueAt) {
        earliest = timer;
      }
    }
    return earliest;
  }
}
