import { describe, expect, it } from 'vitest';

import { MemoryLogger } from '@nex/core';

import { AudioSubsystem } from './index.js';

describe('AudioSubsystem', () => {
  it('records the audio config it is handed without changing objects', () => {
    const audio = new AudioSubsystem({ logger: new MemoryLogger() });
    const config = { bgm: 'space_theme.mp3' };

    audio.init();
    audio.update({ frameNumber: 0, deltaTime: 0.016, objects: [], ui: [], audio: config });
    audio.update({ frameNumber: 1, deltaTime: 0.016, objects: [], ui: [], audio: config });

    expect(audio.getUpdateCount()).toBe(2);
    expect(audio.getLastConfig()).toBe(config);
  });

  it('resets its counters on init', () => {
    const audio = new AudioSubsystem({ logger: new MemoryLogger() });
    audio.update({ frameNumber: 0, deltaTime: 0.016, objects: [], ui: [], audio: {} });

    audio.init();

    expect(audio.getUpdateCount()).toBe(0);
    expect(audio.getLastConfig()).toBeNull();
  });

  it('logs init and shutdown', () => {
    const logger = new MemoryLogger();
    const audio = new AudioSubsystem({ logger });

    audio.init();
    audio.shutdown();

    expect(logger.messages('info')).toEqual(['[Audio] Initialized', '[Audio] Shutdown']);
  });
});
