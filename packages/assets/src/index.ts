/**
 * @nex/assets: resolves scene asset references to opaque handles.
 */

export type { AssetBackend, AssetHandle, AssetLoadReport, PlaceholderBox } from './types.js';
export { AssetError, AssetLoadError } from './errors.js';
export { sha256Hex } from './hash.js';
export { FileAssetBackend, PLACEHOLDER_BOX, PlaceholderAssetBackend } from './backends.js';
export { AssetRegistry } from './asset-registry.js';
export type { AssetRegistryOptions } from './asset-registry.js';
