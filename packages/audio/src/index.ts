/**
 * @nex/audio
 *
 * Audio hook for the frame pipeline. It receives the scene's audio config
 * every tick and performs no mixing; a host backend can subclass it to play
 * the configured music and effects.
 */

import type { NexLogger, SceneConfigValue } from '@nex/core';
import type { SceneFrame, Subsystem } from '@nex/engine';

export type AudioConfig = Readonly<Record<string, SceneConfigValue>>;

export interface AudioSubsystemOptions {
  logger?: NexLogger;
}

export class AudioSubsystem implements Subsystem {
  readonly name = 'Audio';

  protected readonly logger: NexLogger;
  private updateCount = 0;
  private lastConfig: AudioConfig | null = null;

  constructor(options: AudioSubsystemOptions = {}) {
    this.logger = options.logger ?? console;
  }

  init(): void {
    this.updateCount = 0;
    this.lastConfig = null;
    this.logger.info('[Audio] Initialized');
  }

  update(frame: SceneFrame): void {
    this.updateCount += 1;
    this.lastConfig = frame.audio;
    this.logger.debug('[Audio] Updated audio');
  }

  shutdown(): void {
    this.logger.info('[Audio] Shutdown');
  }

  getUpdateCount(): number {
    return this.updateCount;
  }

  /** Audio config seen on the most recent tick. */
  getLastConfig(): AudioConfig | null {
    return this.lastConfig;
  }
}
