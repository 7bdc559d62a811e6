/**
 * @nex/renderer
 *
 * Renderer boundary, the render pipeline step and a headless three.js sink.
 */
export type { RenderableObject, RenderSink } from './render-sink.js';
export { RenderSubsystem } from './render-subsystem.js';
export type { RenderSubsystemOptions } from './render-subsystem.js';
export { ThreeSceneRenderer } from './three-scene-renderer.js';
export type { ThreeSceneRendererOptions } from './three-scene-renderer.js';
