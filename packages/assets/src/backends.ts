/**
 * Asset backends.
 *
 * The placeholder backend stands in for every reference with a unit box and
 * never fails. The file backend only checks that a reference names a readable
 * file under its base directory; it does not decode the contents. Absolute
 * references are accepted when they point inside that directory.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';

import { describeError } from '@nex/core';

import { AssetLoadError } from './errors.js';
import { sha256Hex } from './hash.js';
import type { AssetBackend, AssetHandle, PlaceholderBox } from './types.js';

export const PLACEHOLDER_BOX: PlaceholderBox = Object.freeze({ width: 1, height: 1, depth: 1 });

export class PlaceholderAssetBackend implements AssetBackend {
  readonly name = 'placeholder';

  load(ref: string): Promise<AssetHandle> {
    return Promise.resolve({ ref, kind: 'placeholder', box: PLACEHOLDER_BOX });
  }
}

export class FileAssetBackend implements AssetBackend {
  readonly name = 'file';
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  async load(ref: string): Promise<AssetHandle> {
    // Scene files are often authored on Windows.
    const normalized = ref.replace(/\\/g, '/');
    const path = resolve(this.baseDir, normalized);
    const fromBase = relative(this.baseDir, path);
    if (fromBase === '' || fromBase.startsWith('..') || isAbsolute(fromBase)) {
      throw new AssetLoadError(ref, `resolves outside ${this.baseDir}`);
    }

    let data: Uint8Array;
    try {
      data = await readFile(path);
    } catch (error) {
      throw new AssetLoadError(ref, describeError(error));
    }

    return {
      ref,
      kind: 'file',
      path,
      byteLength: data.byteLength,
      hash: sha256Hex(data),
    };
  }
}
