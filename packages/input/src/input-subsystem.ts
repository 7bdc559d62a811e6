/**
 * InputSubsystem: first step of every tick.
 *
 * Keeps the set of pressed keys for hosts that poll a keyboard. Nothing in the
 * runtime writes or reads it yet; `setKeyState` is where a host backend feeds
 * key transitions in.
 */

import type { NexLogger } from '@nex/core';
import type { SceneFrame, Subsystem } from '@nex/engine';

export interface InputSubsystemOptions {
  logger?: NexLogger;
}

export class InputSubsystem implements Subsystem {
  readonly name = 'Input';

  private readonly logger: NexLogger;
  private readonly pressedKeys = new Set<string>();

  constructor(options: InputSubsystemOptions = {}) {
    this.logger = options.logger ?? console;
  }

  update(_frame: SceneFrame): void {
    this.logger.debug('[Input] Processing input');
  }

  setKeyState(key: string, down: boolean): void {
    const normalized = key.toLowerCase();
    if (down) {
      this.pressedKeys.add(normalized);
    } else {
      this.pressedKeys.delete(normalized);
    }
  }

  isKeyDown(key: string): boolean {
    return this.pressedKeys.has(key.toLowerCase());
  }

  getPressedKeys(): string[] {
    return [...this.pressedKeys];
  }
}
