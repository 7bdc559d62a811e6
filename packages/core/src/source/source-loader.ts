import { readFile } from 'node:fs/promises';

import { SourceLoadError, describeError } from '../errors.js';

/** Default extension for scene source files. */
export const SCENE_FILE_EXTENSION = '.nex';

/**
 * Read a scene source file as UTF-8 text.
 * Any read failure surfaces as a SourceLoadError carrying the path.
 */
export async function loadSourceFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new SourceLoadError(path, describeError(error));
  }
}
