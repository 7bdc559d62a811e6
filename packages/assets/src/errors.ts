/**
 * Typed error classes for the asset system.
 */

import { NexError } from '@nex/core';

/** Base class for all asset-system errors. */
export class AssetError extends NexError {
  constructor(message: string) {
    super(message);
    this.name = 'AssetError';
  }
}

/** A single asset reference could not be resolved by the backend. */
export class AssetLoadError extends AssetError {
  constructor(
    public readonly ref: string,
    public readonly reason: string,
  ) {
    super(`Failed to load asset "${ref}": ${reason}`);
    this.name = 'AssetLoadError';
  }
}
