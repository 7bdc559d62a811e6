/**
 * @nex/core: scene language front end shared by every runtime package.
 */

export { Vector3 } from './math/index.js';

export {
  NexError,
  SceneSyntaxError,
  SceneValidationError,
  SourceLoadError,
  describeError,
} from './errors.js';
export type { SceneValidationIssue } from './errors.js';

export { createConsoleLogger, MemoryLogger } from './logging.js';
export type { ConsoleLoggerOptions, NexLogger, RecordedLogLine } from './logging.js';

export * from './scene/index.js';

export { loadSourceFile, SCENE_FILE_EXTENSION } from './source/source-loader.js';
