/**
 * @nex/input: input hook for the frame pipeline.
 */

export { InputSubsystem } from './input-subsystem.js';
export type { InputSubsystemOptions } from './input-subsystem.js';
