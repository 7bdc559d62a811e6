import type { NexLogger } from '@nex/core';
import type { SceneFrame, Subsystem } from '@nex/engine';

import type { RenderableObject, RenderSink } from './render-sink.js';

export interface RenderSubsystemOptions {
  logger?: NexLogger;
}

/**
 * Pipeline step that hands the scene to a `RenderSink`. Positions are copied,
 * so the sink sees the state at the end of this tick even if it holds on to
 * the list.
 */
export class RenderSubsystem implements Subsystem {
  readonly name = 'Renderer';

  readonly sink: RenderSink;
  private readonly logger: NexLogger;

  constructor(sink: RenderSink, options: RenderSubsystemOptions = {}) {
    this.sink = sink;
    this.logger = options.logger ?? console;
  }

  init(): void {
    this.sink.init();
    this.logger.info('[Renderer] Initialized');
  }

  update(frame: SceneFrame): void {
    const renderables: RenderableObject[] = frame.objects.map((object) => ({
      name: object.name,
      position: object.position.clone(),
      scale: object.scale,
    }));
    this.sink.render(renderables, frame.ui);
  }

  shutdown(): void {
    this.sink.shutdown();
    this.logger.info('[Renderer] Shutdown');
  }
}
