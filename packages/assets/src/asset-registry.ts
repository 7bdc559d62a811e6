/**
 * AssetRegistry: resolves the asset references named by a scene.
 *
 * One registry belongs to one runtime. It is filled once before the frame
 * loop starts and cleared once after it ends, so it needs no locking.
 */

import { describeError, type NexLogger } from '@nex/core';

import { PlaceholderAssetBackend } from './backends.js';
import { AssetLoadError } from './errors.js';
import type { AssetBackend, AssetHandle, AssetLoadReport } from './types.js';

export interface AssetRegistryOptions {
  backend?: AssetBackend;
  logger?: NexLogger;
}

export class AssetRegistry {
  readonly backend: AssetBackend;

  private readonly logger: NexLogger;
  private readonly handles = new Map<string, AssetHandle>();

  constructor(options: AssetRegistryOptions = {}) {
    this.backend = options.backend ?? new PlaceholderAssetBackend();
    this.logger = options.logger ?? console;
  }

  get size(): number {
    return this.handles.size;
  }

  has(ref: string): boolean {
    return this.handles.has(ref);
  }

  get(ref: string): AssetHandle | undefined {
    return this.handles.get(ref);
  }

  refs(): string[] {
    return [...this.handles.keys()];
  }

  /**
   * Load every reference in order. A failing reference is recorded in the
   * report and the batch carries on; loading a reference again replaces its
   * handle.
   */
  async load(refs: readonly string[]): Promise<AssetLoadReport> {
    const loaded: string[] = [];
    const failed: AssetLoadError[] = [];

    for (const ref of refs) {
      this.logger.info(`[AssetRegistry] Loading asset: ${ref}`);
      try {
        const handle = await this.backend.load(ref);
        this.handles.set(ref, handle);
        loaded.push(ref);
      } catch (error) {
        const loadError = error instanceof AssetLoadError
          ? error
          : new AssetLoadError(ref, describeError(error));
        failed.push(loadError);
        this.logger.warn(`[AssetRegistry] ${loadError.message}`);
      }
    }

    return { loaded, failed };
  }

  cleanup(): void {
    this.handles.clear();
    this.logger.info('[AssetRegistry] Assets cleaned up');
  }
}
