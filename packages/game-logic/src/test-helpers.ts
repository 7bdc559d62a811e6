import { createSceneObject, type SceneObject } from '@nex/core';
import type { SceneFrame } from '@nex/engine';

/** Build a frame around the given objects with empty ui and audio slices. */
export function makeFrame(objects: SceneObject[], deltaTime: number, frameNumber = 0): SceneFrame {
  return { frameNumber, deltaTime, objects, ui: [], audio: {} };
}

export function makeObject(name: string, x = 0, y = 0, z = 0): SceneObject {
  const object = createSceneObject(name);
  object.position.set(x, y, z);
  return object;
}
