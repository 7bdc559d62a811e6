/**
 * Gravity with a floor at y = 0.
 *
 * No velocity is carried between ticks: each tick moves every object down by
 * `GRAVITY * dt` and clamps it to the floor, with no bounce.
 */

import type { NexLogger } from '@nex/core';
import type { SceneFrame, Subsystem } from '@nex/engine';

/** Downward acceleration in units per second squared. */
export const GRAVITY = 9.8;

/** Height of the floor plane. */
export const FLOOR_Y = 0;

export interface PhysicsSubsystemOptions {
  logger?: NexLogger;
}

export class PhysicsSubsystem implements Subsystem {
  readonly name = 'Physics';

  private readonly logger: NexLogger;

  constructor(options: PhysicsSubsystemOptions = {}) {
    this.logger = options.logger ?? console;
  }

  init(): void {
    this.logger.info('[Physics] Initialized');
  }

  update(frame: SceneFrame): void {
    for (const object of frame.objects) {
      const y = object.position.y - GRAVITY * frame.deltaTime;
      object.position.y = Math.max(y, FLOOR_Y);
    }
    this.logger.debug('[Physics] Updated physics');
  }

  shutdown(): void {
    this.logger.info('[Physics] Shutdown');
  }
}
