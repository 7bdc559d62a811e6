/**
 * Ordered list of tick handlers run once per frame.
 *
 * The order is data: callers build the pipeline from a handler list, and the
 * pipeline runs them synchronously in that order.
 */

export interface TickHandler<TFrame> {
  readonly name: string;
  update(frame: TFrame): void;
}

export class TickPipeline<TFrame> {
  private readonly handlers: readonly TickHandler<TFrame>[];

  constructor(handlers: readonly TickHandler<TFrame>[]) {
    const seen = new Set<string>();
    for (const handler of handlers) {
      if (seen.has(handler.name)) {
        throw new Error(`Tick handler "${handler.name}" appears more than once`);
      }
      seen.add(handler.name);
    }
    this.handlers = [...handlers];
  }

  get order(): string[] {
    return this.handlers.map((handler) => handler.name);
  }

  run(frame: TFrame): void {
    for (const handler of this.handlers) {
      handler.update(frame);
    }
  }
}

/**
 * Arrange handlers by name. Every name must match exactly one handler and
 * every handler must be named.
 */
export function orderTickHandlers<TFrame>(
  handlers: readonly TickHandler<TFrame>[],
  order: readonly string[],
): TickHandler<TFrame>[] {
  const byName = new Map(handlers.map((handler) => [handler.name, handler] as const));
  if (order.length !== handlers.length) {
    throw new Error(
      `Tick order names ${order.length} handler(s) but ${handlers.length} are available`,
    );
  }
  return order.map((name) => {
    const handler = byName.get(name);
    if (!handler) {
      throw new Error(`Tick order names unknown handler "${name}"`);
    }
    return handler;
  });
}
