/**
 * Asset system types.
 */

import type { AssetLoadError } from './errors.js';

/** Size of the stand-in box used for every placeholder asset. */
export interface PlaceholderBox {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
}

export type AssetHandle =
  | {
      readonly ref: string;
      readonly kind: 'placeholder';
      readonly box: PlaceholderBox;
    }
  | {
      readonly ref: string;
      readonly kind: 'file';
      /** Absolute path the reference resolved to. */
      readonly path: string;
      readonly byteLength: number;
      /** SHA-256 of the file contents. */
      readonly hash: string;
    };

/**
 * Resolves one asset reference to a handle. The runtime never interprets the
 * handle; decoding belongs to the host's renderer or audio backend.
 */
export interface AssetBackend {
  readonly name: string;
  load(ref: string): Promise<AssetHandle>;
}

export interface AssetLoadReport {
  /** References that resolved, in request order. */
  readonly loaded: string[];
  readonly failed: AssetLoadError[];
}
