import type { SceneConfigValue, SceneObject, UiNode } from '@nex/core';

/**
 * Per-tick view of the scene handed to every tick handler.
 * `objects` is the live IR list; handlers mutate its entries in place.
 */
export interface SceneFrame {
  readonly frameNumber: number;
  /** Seconds elapsed since the previous tick. */
  readonly deltaTime: number;
  readonly objects: SceneObject[];
  readonly ui: readonly UiNode[];
  readonly audio: Readonly<Record<string, SceneConfigValue>>;
}
