export { parseScene, SCENE_MARKER } from './scene-parser.js';
export type { SceneParseOptions } from './scene-parser.js';
export { classifySceneLine, splitSceneLines } from './scene-line.js';
export type { SceneLine } from './scene-line.js';
export { validateSceneGraph } from './scene-validator.js';
export {
  createEmptySceneGraph,
  createSceneObject,
  sceneGraphToJSON,
} from './scene-types.js';
export type {
  SceneConfigValue,
  SceneGraph,
  SceneGraphJSON,
  SceneObject,
  UiNode,
} from './scene-types.js';
