/**
 * @nex/app: runtime facade and the nex-run command.
 */

export { NexRuntime, RuntimeStateError } from './runtime.js';
export type { NexRuntimeEvents, NexRuntimeOptions } from './runtime.js';
export {
  DEFAULT_RUNTIME_CONFIG,
  RUNTIME_SUBSYSTEM_NAMES,
  RuntimeConfigError,
  createAssetBackend,
  resolveRuntimeConfig,
} from './runtime-config.js';
export type {
  AssetBackendKind,
  RuntimeConfig,
  RuntimeSubsystemName,
} from './runtime-config.js';
export { DEMO_SCENE_PATH, RUN_USAGE, abortOnInterrupt, parseRunArgs, runNexCli } from './cli.js';
export type { ParsedRunArgs, RunArgs, RunCliOptions, SignalSource } from './cli.js';
