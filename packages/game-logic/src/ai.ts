import type { NexLogger } from '@nex/core';
import type { SceneFrame, Subsystem } from '@nex/engine';

/** Objects whose lower-cased name equals this drift left. */
export const ENEMY_NAME = 'enemy';

/** Leftward drift in units per second. */
export const ENEMY_DRIFT_SPEED = 1.0;

export interface AiSubsystemOptions {
  logger?: NexLogger;
}

/** Moves every enemy along -x at a fixed speed. No targeting or pathing. */
export class AiSubsystem implements Subsystem {
  readonly name = 'AI';

  private readonly logger: NexLogger;

  constructor(options: AiSubsystemOptions = {}) {
    this.logger = options.logger ?? console;
  }

  init(): void {
    this.logger.info('[AI] Initialized');
  }

  update(frame: SceneFrame): void {
    for (const object of frame.objects) {
      if (object.name.toLowerCase() === ENEMY_NAME) {
        object.position.x -= ENEMY_DRIFT_SPEED * frame.deltaTime;
      }
    }
    this.logger.debug('[AI] Updated AI');
  }
}
