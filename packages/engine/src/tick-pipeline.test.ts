import { describe, expect, it } from 'vitest';

import { TickPipeline, orderTickHandlers, type TickHandler } from './tick-pipeline.js';

function recorder(name: string, log: string[]): TickHandler<number> {
  return {
    name,
    update: (frame) => {
      log.push(`${name}@${frame}`);
    },
  };
}

describe('TickPipeline', () => {
  it('runs handlers in list order on every frame', () => {
    const log: string[] = [];
    const pipeline = new TickPipeline([recorder('Input', log), recorder('Physics', log), recorder('Render', log)]);

    pipeline.run(1);
    pipeline.run(2);

    expect(pipeline.order).toEqual(['Input', 'Physics', 'Render']);
    expect(log).toEqual(['Input@1', 'Physics@1', 'Render@1', 'Input@2', 'Physics@2', 'Render@2']);
  });

  it('rejects duplicate handler names', () => {
    const log: string[] = [];
    expect(() => new TickPipeline([recorder('AI', log), recorder('AI', log)])).toThrow(
      'Tick handler "AI" appears more than once',
    );
  });

  it('reorders handlers by name', () => {
    const log: string[] = [];
    const handlers = [recorder('A', log), recorder('B', log), recorder('C', log)];

    const pipeline = new TickPipeline(orderTickHandlers(handlers, ['C', 'A', 'B']));
    pipeline.run(0);

    expect(log).toEqual(['C@0', 'A@0', 'B@0']);
  });

  it('rejects an order that names unknown or missing handlers', () => {
    const log: string[] = [];
    const handlers = [recorder('A', log), recorder('B', log)];

    expect(() => orderTickHandlers(handlers, ['A', 'Z'])).toThrow('unknown handler "Z"');
    expect(() => orderTickHandlers(handlers, ['A'])).toThrow('Tick order names 1 handler(s) but 2 are available');
  });
});
