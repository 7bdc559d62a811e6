import type { SceneValidationIssue } from '../errors.js';
import type { SceneGraph } from './scene-types.js';

/**
 * Check the IR invariants: object names are non-empty, transforms are finite,
 * scales are positive and asset references are non-empty strings.
 */
export function validateSceneGraph(graph: SceneGraph): SceneValidationIssue[] {
  const issues: SceneValidationIssue[] = [];

  graph.objects.forEach((object, index) => {
    const path = `objects[${index}]`;
    if (object.name.trim().length === 0) {
      issues.push({ path: `${path}.name`, message: 'object name must not be empty' });
    }
    if (!Number.isFinite(object.scale) || object.scale <= 0) {
      issues.push({ path: `${path}.scale`, message: `scale must be > 0 (got ${object.scale})` });
    }
    if (!object.position.isFinite()) {
      issues.push({ path: `${path}.position`, message: 'position must be finite' });
    }
    if (!object.rotation.isFinite()) {
      issues.push({ path: `${path}.rotation`, message: 'rotation must be finite' });
    }
  });

  graph.assets.forEach((ref, index) => {
    if (ref.length === 0) {
      issues.push({ path: `assets[${index}]`, message: 'asset reference must not be empty' });
    }
  });

  return issues;
}
