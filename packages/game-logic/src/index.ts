/**
 * @nex/game-logic: per-tick scene simulation.
 */

export { FLOOR_Y, GRAVITY, PhysicsSubsystem } from './physics.js';
export type { PhysicsSubsystemOptions } from './physics.js';
export { AiSubsystem, ENEMY_DRIFT_SPEED, ENEMY_NAME } from './ai.js';
export type { AiSubsystemOptions } from './ai.js';
