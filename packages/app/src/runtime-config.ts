/**
 * Runtime configuration: defaults, overrides and validation.
 */

import { FileAssetBackend, PlaceholderAssetBackend, type AssetBackend } from '@nex/assets';
import { NexError } from '@nex/core';
import { DEFAULT_FRAME_INTERVAL_MS, type FramePacing, type TickErrorPolicy } from '@nex/engine';

/** Names of the five pipeline steps the runtime builds. */
export const RUNTIME_SUBSYSTEM_NAMES = ['Input', 'Physics', 'AI', 'Renderer', 'Audio'] as const;

export type RuntimeSubsystemName = (typeof RUNTIME_SUBSYSTEM_NAMES)[number];

export type AssetBackendKind = 'placeholder' | 'file';

export interface RuntimeConfig {
  /** Wait between ticks in milliseconds. Default: 16. */
  frameIntervalMs: number;
  /** Default: 'fixed-sleep' (full wait after every tick). */
  pacing: FramePacing;
  /** Default: 'stop' (a throwing tick ends the run). */
  tickErrorPolicy: TickErrorPolicy;
  /** Pipeline order; a permutation of RUNTIME_SUBSYSTEM_NAMES. */
  tickOrder: readonly RuntimeSubsystemName[];
  /** Default: 'placeholder'. */
  assetBackend: AssetBackendKind;
  /** Base directory for the file backend. Default: '' (current directory). */
  assetBaseDir: string;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  frameIntervalMs: DEFAULT_FRAME_INTERVAL_MS,
  pacing: 'fixed-sleep',
  tickErrorPolicy: 'stop',
  tickOrder: ['Input', 'Physics', 'AI', 'Renderer', 'Audio'],
  assetBackend: 'placeholder',
  assetBaseDir: '',
};

export class RuntimeConfigError extends NexError {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeConfigError';
  }
}

export function resolveRuntimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  const config: RuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };

  if (!Number.isFinite(config.frameIntervalMs) || config.frameIntervalMs <= 0) {
    throw new RuntimeConfigError(`frameIntervalMs must be > 0 (got ${config.frameIntervalMs})`);
  }

  const expected = [...RUNTIME_SUBSYSTEM_NAMES].sort();
  const actual = [...config.tickOrder].sort();
  if (expected.length !== actual.length || expected.some((name, index) => name !== actual[index])) {
    throw new RuntimeConfigError(
      `tickOrder must list each of ${RUNTIME_SUBSYSTEM_NAMES.join(', ')} exactly once (got ${config.tickOrder.join(', ')})`,
    );
  }

  return config;
}

export function createAssetBackend(config: RuntimeConfig): AssetBackend {
  switch (config.assetBackend) {
    case 'file':
      return new FileAssetBackend(config.assetBaseDir || process.cwd());
    case 'placeholder':
      return new PlaceholderAssetBackend();
  }
}
