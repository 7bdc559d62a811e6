/**
 * Subsystem interface and lifecycle registry.
 *
 * Lifecycle hooks are optional: a subsystem without `init` or `shutdown` is
 * skipped by the corresponding pass. Both passes walk registration order.
 * Once `initAll` has run, only subsystems whose init completed are shut down.
 */

import { describeError, type NexLogger } from '@nex/core';

import type { SceneFrame } from './frame.js';
import type { TickHandler } from './tick-pipeline.js';

export interface Subsystem<TFrame = SceneFrame> extends TickHandler<TFrame> {
  /** Unique subsystem name. */
  readonly name: string;
  /** Acquire resources before the first tick. */
  init?(): Promise<void> | void;
  /** Release resources after the last tick. */
  shutdown?(): void;
}

export interface SubsystemShutdownFailure {
  readonly name: string;
  readonly error: unknown;
}

export class SubsystemRegistry<TFrame = SceneFrame> {
  private readonly subsystems = new Map<string, Subsystem<TFrame>>();
  private readonly registrationOrder: Subsystem<TFrame>[] = [];
  private initialized: Set<Subsystem<TFrame>> | null = null;

  register(subsystem: Subsystem<TFrame>): void {
    if (this.subsystems.has(subsystem.name)) {
      throw new Error(`Subsystem "${subsystem.name}" already registered`);
    }
    this.subsystems.set(subsystem.name, subsystem);
    this.registrationOrder.push(subsystem);
  }

  get(name: string): Subsystem<TFrame> | undefined {
    return this.subsystems.get(name);
  }

  has(name: string): boolean {
    return this.subsystems.has(name);
  }

  list(): readonly Subsystem<TFrame>[] {
    return this.registrationOrder;
  }

  async initAll(): Promise<void> {
    const initialized = new Set<Subsystem<TFrame>>();
    this.initialized = initialized;
    for (const subsystem of this.registrationOrder) {
      if (typeof subsystem.init === 'function') {
        await subsystem.init();
      }
      initialized.add(subsystem);
    }
  }

  /**
   * Shut every subsystem down in registration order. A throwing shutdown is
   * recorded and the pass moves on to the next subsystem.
   */
  shutdownAll(logger: NexLogger = console): SubsystemShutdownFailure[] {
    const failures: SubsystemShutdownFailure[] = [];
    for (const subsystem of this.registrationOrder) {
      if (typeof subsystem.shutdown !== 'function') {
        continue;
      }
      if (this.initialized && !this.initialized.has(subsystem)) {
        continue;
      }
      try {
        subsystem.shutdown();
      } catch (error) {
        failures.push({ name: subsystem.name, error });
        logger.error(`[SubsystemRegistry] ${subsystem.name} shutdown failed: ${describeError(error)}`);
      }
    }
    this.subsystems.clear();
    this.registrationOrder.length = 0;
    this.initialized = null;
    return failures;
  }
}
