/**
 * Scene intermediate representation produced by the parser.
 */

import { Vector3 } from '../math/vector3.js';

export type SceneConfigValue =
  | string
  | number
  | boolean
  | string[]
  | number[];

/** UI nodes are carried through to the renderer without interpretation. */
export type UiNode = Readonly<Record<string, unknown>>;

export interface SceneObject {
  name: string;
  position: Vector3;
  rotation: Vector3;
  scale: number;
}

export interface SceneGraph {
  /** Source order; also the default render order. */
  objects: SceneObject[];
  ui: UiNode[];
  physics: Record<string, SceneConfigValue>;
  audio: Record<string, SceneConfigValue>;
  assets: string[];
}

export function createSceneObject(name: string): SceneObject {
  return {
    name,
    position: new Vector3(0, 0, 0),
    rotation: new Vector3(0, 0, 0),
    scale: 1,
  };
}

export function createEmptySceneGraph(): SceneGraph {
  return { objects: [], ui: [], physics: {}, audio: {}, assets: [] };
}

/** Plain-data view of the IR, stable under JSON serialization. */
export interface SceneGraphJSON {
  objects: {
    name: string;
    position: [number, number, number];
    rotation: [number, number, number];
    scale: number;
  }[];
  ui: UiNode[];
  physics: Record<string, SceneConfigValue>;
  audio: Record<string, SceneConfigValue>;
  assets: string[];
}

export function sceneGraphToJSON(graph: SceneGraph): SceneGraphJSON {
  return {
    objects: graph.objects.map((object) => ({
      name: object.name,
      position: object.position.toArray(),
      rotation: object.rotation.toArray(),
      scale: object.scale,
    })),
    ui: [...graph.ui],
    physics: { ...graph.physics },
    audio: { ...graph.audio },
    assets: [...graph.assets],
  };
}
