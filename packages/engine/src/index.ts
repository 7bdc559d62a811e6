/**
 * @nex/engine
 *
 * Subsystem lifecycle, tick ordering and frame pacing.
 */

export type { SceneFrame } from './frame.js';

export type { Subsystem, SubsystemShutdownFailure } from './subsystem.js';
export { SubsystemRegistry } from './subsystem.js';

export type { TickHandler } from './tick-pipeline.js';
export { TickPipeline, orderTickHandlers } from './tick-pipeline.js';

export type { FrameClock } from './frame-clock.js';
export { ManualFrameClock, systemFrameClock } from './frame-clock.js';

export type {
  FramePacing,
  FrameSchedulerOptions,
  FrameTick,
  TickErrorPolicy,
} from './frame-scheduler.js';
export {
  DEFAULT_FRAME_INTERVAL_MS,
  FrameScheduler,
  FrameSchedulerError,
} from './frame-scheduler.js';

export { EventBus } from './event-bus.js';
