import { describe, expect, it } from 'vitest';

import { MemoryLogger } from '@nex/core';

import { PhysicsSubsystem } from './physics.js';
import { makeFrame, makeObject } from './test-helpers.js';

describe('PhysicsSubsystem', () => {
  it('drops objects by 9.8 * dt', () => {
    const physics = new PhysicsSubsystem({ logger: new MemoryLogger() });
    const crate = makeObject('Crate', 1, 20, 3);

    physics.update(makeFrame([crate], 0.5));

    expect(crate.position.y).toBeCloseTo(15.1);
    expect(crate.position.x).toBe(1);
    expect(crate.position.z).toBe(3);
  });

  it('clamps to the floor without bouncing', () => {
    const physics = new PhysicsSubsystem({ logger: new MemoryLogger() });
    const crate = makeObject('Crate', 0, 5, 0);

    physics.update(makeFrame([crate], 1));
    expect(crate.position.y).toBe(0);

    physics.update(makeFrame([crate], 1));
    physics.update(makeFrame([crate], 0.25));
    expect(crate.position.y).toBe(0);
  });

  it('matches max(y0 - 9.8 dt, 0) across heights and steps', () => {
    const physics = new PhysicsSubsystem({ logger: new MemoryLogger() });
    const cases: [number, number][] = [
      [0, 1],
      [0, 0.016],
      [9.8, 1],
      [10, 0.1],
      [100, 0.016],
      [0.001, 0.5],
    ];

    for (const [y0, dt] of cases) {
      const object = makeObject('Probe', 0, y0, 0);
      physics.update(makeFrame([object], dt));
      expect(object.position.y).toBeCloseTo(Math.max(y0 - 9.8 * dt, 0));
    }
  });

  it('does not touch rotation or scale', () => {
    const physics = new PhysicsSubsystem({ logger: new MemoryLogger() });
    const object = makeObject('Player', 0, 3, 0);

    physics.update(makeFrame([object], 0.1));

    expect(object.rotation.toArray()).toEqual([0, 0, 0]);
    expect(object.scale).toBe(1);
  });

  it('logs its lifecycle', () => {
    const logger = new MemoryLogger();
    const physics = new PhysicsSubsystem({ logger });

    physics.init();
    physics.update(makeFrame([], 0.016));
    physics.shutdown();

    expect(logger.lines).toEqual([
      { level: 'info', message: '[Physics] Initialized' },
      { level: 'debug', message: '[Physics] Updated physics' },
      { level: 'info', message: '[Physics] Shutdown' },
    ]);
  });
});
