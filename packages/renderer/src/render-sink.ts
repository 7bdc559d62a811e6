/**
 * Renderer boundary.
 *
 * The host owns the window, camera transform and draw-call submission. Once
 * per tick the runtime hands it one `RenderableObject` per scene object, in
 * scene order, plus the untouched UI tree.
 */

import type { Vector3, UiNode } from '@nex/core';

export interface RenderableObject {
  readonly name: string;
  /** Snapshot taken after the tick's simulation steps. */
  readonly position: Readonly<Vector3>;
  readonly scale: number;
}

export interface RenderSink {
  init(): void;
  render(objects: readonly RenderableObject[], ui: readonly UiNode[]): void;
  shutdown(): void;
}
