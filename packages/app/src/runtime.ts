/**
 * NexRuntime: loads a scene and drives the frame pipeline over it.
 *
 * One runtime owns one asset registry and at most one loaded scene. `run()`
 * consumes the scene: teardown clears the assets, so a second run needs a
 * fresh `loadCode()`.
 */

import { AssetRegistry, type AssetBackend } from '@nex/assets';
import { AudioSubsystem } from '@nex/audio';
import {
  NexError,
  SceneSyntaxError,
  SceneValidationError,
  SourceLoadError,
  describeError,
  loadSourceFile,
  parseScene,
  type NexLogger,
  type SceneGraph,
} from '@nex/core';
import {
  EventBus,
  FrameScheduler,
  SubsystemRegistry,
  TickPipeline,
  orderTickHandlers,
  type FrameClock,
  type SceneFrame,
} from '@nex/engine';
import { AiSubsystem, PhysicsSubsystem } from '@nex/game-logic';
import { InputSubsystem } from '@nex/input';
import { RenderSubsystem, ThreeSceneRenderer, type RenderSink } from '@nex/renderer';

import {
  createAssetBackend,
  resolveRuntimeConfig,
  type RuntimeConfig,
} from './runtime-config.js';

export class RuntimeStateError extends NexError {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeStateError';
  }
}

export interface NexRuntimeEvents {
  'runtime:loaded': { objectCount: number; assetCount: number };
  'runtime:load-failed': { error: NexError };
  'runtime:started': { tickOrder: readonly string[] };
  'runtime:tick': { frameNumber: number; deltaTime: number };
  'runtime:stopped': { frameCount: number; error: unknown };
}

export interface NexRuntimeOptions {
  config?: Partial<RuntimeConfig>;
  logger?: NexLogger;
  clock?: FrameClock;
  /** Where the Renderer step draws. Default: a headless three.js scene. */
  renderSink?: RenderSink;
  /** Overrides the backend selected by `config.assetBackend`. */
  assetBackend?: AssetBackend;
}

export class NexRuntime {
  readonly config: RuntimeConfig;
  readonly events = new EventBus<NexRuntimeEvents>();
  readonly assets: AssetRegistry;

  private readonly logger: NexLogger;
  private readonly clock: FrameClock | undefined;
  private readonly renderSink: RenderSink;

  private sceneGraph: SceneGraph | null = null;
  private scheduler: FrameScheduler | null = null;
  private stopRequested = false;

  constructor(options: NexRuntimeOptions = {}) {
    this.config = resolveRuntimeConfig(options.config);
    this.logger = options.logger ?? console;
    this.clock = options.clock;
    this.renderSink = options.renderSink ?? new ThreeSceneRenderer({ logger: this.logger });
    this.assets = new AssetRegistry({
      backend: options.assetBackend ?? createAssetBackend(this.config),
      logger: this.logger,
    });
  }

  /** The loaded scene, or null before a successful load and after a run. */
  getSceneGraph(): SceneGraph | null {
    return this.sceneGraph;
  }

  isRunning(): boolean {
    return this.scheduler !== null;
  }

  /**
   * Parse `source`, validate it and load its assets. Any previously loaded
   * scene is dropped first. Load errors are logged and reported as `false`;
   * anything else propagates.
   */
  async loadCode(source: string, filePath?: string): Promise<boolean> {
    this.assertIdle('load');
    this.unload();

    let graph: SceneGraph;
    try {
      graph = parseScene(source, { filePath });
    } catch (error) {
      if (error instanceof SceneSyntaxError || error instanceof SceneValidationError) {
        return this.failLoad(`Syntax Error: ${error.message}`, error);
      }
      throw error;
    }

    const report = await this.assets.load(graph.assets);
    const [firstFailure] = report.failed;
    if (firstFailure) {
      this.assets.cleanup();
      const refs = report.failed.map((failure) => failure.ref).join(', ');
      return this.failLoad(`Asset load failed: ${refs}`, firstFailure);
    }

    this.sceneGraph = graph;
    this.logger.info('[NexRuntime] Code loaded successfully');
    this.events.emit('runtime:loaded', {
      objectCount: graph.objects.length,
      assetCount: graph.assets.length,
    });
    return true;
  }

  async loadFile(path: string): Promise<boolean> {
    this.assertIdle('load');
    this.unload();

    let source: string;
    try {
      source = await loadSourceFile(path);
    } catch (error) {
      if (error instanceof SourceLoadError) {
        return this.failLoad(`Load Error: ${error.message}`, error);
      }
      throw error;
    }
    return this.loadCode(source, path);
  }

  /**
   * Run the loaded scene until `signal` aborts or `stop()` is called.
   * Teardown runs exactly once whichever way the loop ends.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.assertIdle('run');
    const graph = this.sceneGraph;
    if (!graph) {
      throw new RuntimeStateError('No scene loaded; call loadCode() first');
    }

    const registry = new SubsystemRegistry();
    registry.register(new RenderSubsystem(this.renderSink, { logger: this.logger }));
    registry.register(new PhysicsSubsystem({ logger: this.logger }));
    registry.register(new AiSubsystem({ logger: this.logger }));
    registry.register(new AudioSubsystem({ logger: this.logger }));
    registry.register(new InputSubsystem({ logger: this.logger }));

    const pipeline = new TickPipeline<SceneFrame>(
      orderTickHandlers(registry.list(), this.config.tickOrder),
    );
    const scheduler = new FrameScheduler({
      intervalMs: this.config.frameIntervalMs,
      pacing: this.config.pacing,
      tickErrorPolicy: this.config.tickErrorPolicy,
      clock: this.clock,
      logger: this.logger,
    });
    this.scheduler = scheduler;
    this.stopRequested = false;

    const { objects, ui, audio } = graph;
    let failure: unknown = null;

    try {
      await registry.initAll();
      if (this.stopRequested) {
        this.logger.info('[NexRuntime] Stopped before the first tick');
        return;
      }
      this.logger.info(`[NexRuntime] Tick order: ${pipeline.order.join(' -> ')}`);
      this.events.emit('runtime:started', { tickOrder: pipeline.order });

      await scheduler.run((deltaTime, frameNumber) => {
        pipeline.run({ frameNumber, deltaTime, objects, ui, audio });
        this.events.emit('runtime:tick', { frameNumber, deltaTime });
      }, signal);
    } catch (error) {
      failure = error;
      throw error;
    } finally {
      this.teardown(registry);
      this.scheduler = null;
      this.sceneGraph = null;
      this.events.emit('runtime:stopped', {
        frameCount: scheduler.getFrameNumber(),
        error: failure,
      });
    }
  }

  /** End the current run, if any. A stop during subsystem init skips the loop. */
  stop(): void {
    if (!this.scheduler) {
      return;
    }
    this.stopRequested = true;
    this.scheduler.stop();
  }

  private teardown(registry: SubsystemRegistry): void {
    registry.shutdownAll(this.logger);
    try {
      this.assets.cleanup();
    } catch (error) {
      this.logger.error(`[NexRuntime] Asset cleanup failed: ${describeError(error)}`);
    }
    this.logger.info('[NexRuntime] Stopped');
  }

  private unload(): void {
    this.sceneGraph = null;
    if (this.assets.size > 0) {
      this.assets.cleanup();
    }
  }

  private failLoad(message: string, error: NexError): false {
    this.logger.error(`[NexRuntime] ${message}`);
    this.events.emit('runtime:load-failed', { error });
    return false;
  }

  private assertIdle(action: 'load' | 'run'): void {
    if (this.scheduler) {
      throw new RuntimeStateError(`Cannot ${action} while the runtime is running`);
    }
  }
}
