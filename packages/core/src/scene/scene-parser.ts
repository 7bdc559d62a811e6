/**
 * Nex scene parser.
 *
 * The language is line-oriented:
 *
 *   game SpaceBattle {
 *     import "ship.obj"
 *     object Player { position=(0,10,0) }
 *     ui HUD { panel topLeft { text "Score: 0" } }
 *     audio { bgm = "space_theme.mp3" }
 *   }
 *
 * Only `object` and `import` statements produce IR. Inline object attributes
 * and the `ui` / `audio` / physics blocks are accepted but not parsed, so every
 * object starts at the default transform and the config slices stay empty.
 */

import { SceneSyntaxError, SceneValidationError } from '../errors.js';
import { classifySceneLine, splitSceneLines } from './scene-line.js';
import { createEmptySceneGraph, createSceneObject, type SceneGraph } from './scene-types.js';
import { validateSceneGraph } from './scene-validator.js';

/** Marker that must appear somewhere in every scene source. */
export const SCENE_MARKER = 'game';

export interface SceneParseOptions {
  /** Source file path for error reporting. */
  filePath?: string;
}

export function parseScene(source: string, options: SceneParseOptions = {}): SceneGraph {
  // Substring test: the marker may sit anywhere, including mid-line.
  if (!source.includes(SCENE_MARKER)) {
    throw new SceneSyntaxError(
      `Nex code must start with '${SCENE_MARKER}'`,
      options.filePath,
    );
  }

  const graph = createEmptySceneGraph();

  for (const line of splitSceneLines(source)) {
    const statement = classifySceneLine(line);
    switch (statement.kind) {
      case 'object':
        graph.objects.push(createSceneObject(statement.name));
        break;
      case 'import':
        graph.assets.push(statement.ref);
        break;
      case 'other':
        break;
    }
  }

  const issues = validateSceneGraph(graph);
  if (issues.length > 0) {
    throw new SceneValidationError(issues, options.filePath);
  }

  return graph;
}
