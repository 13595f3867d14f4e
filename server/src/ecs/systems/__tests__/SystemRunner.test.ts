// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { World } from '#shared';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import { createTestWorld } from './testUtils';
import { logger } from '../../../logger';

function recordingSystem(name: string, log: string[]): System {
  return {
    name,
    update: () => {
      log.push(name);
    },
  };
}

describe('SystemRunner', () => {
  let world: World;
  let runner: SystemRunner;

  beforeEach(() => {
    world = createTestWorld();
    runner = new SystemRunner();
    vi.mocked(logger.error).mockClear();
  });

  it('runs systems in priority order, lowest first', () => {
    const log: string[] = [];
    runner.register(recordingSystem('late', log), 900);
    runner.register(recordingSystem('early', log), 100);
    runner.register(recordingSystem('middle', log), 500);

    runner.update(world, 1 / 60);

    expect(log).toEqual(['early', 'middle', 'late']);
  });

  it('passes the world and delta time through', () => {
    const update = vi.fn();
    runner.register({ name: 'probe', update }, 1);

    runner.update(world, 0.25);

    expect(update).toHaveBeenCalledWith(world, 0.25);
  });

  it('logs a throwing system and keeps running the rest', () => {
    const log: string[] = [];
    runner.register(
      {
        name: 'Broken',
        update: () => {
          throw new Error('bad tick');
        },
      },
      1
    );
    runner.register(recordingSystem('after', log), 2);

    runner.update(world, 1 / 60);

    expect(log).toEqual(['after']);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(logger.error).mock.calls[0][1]).toBe('System Broken threw an error');
  });

  it('numbers ticks and reports the failing tick', () => {
    let calls = 0;
    runner.register(
      {
        name: 'FailsOnSecond',
        update: () => {
          calls++;
          if (calls === 2) throw new Error('second tick');
        },
      },
      1
    );

    runner.update(world, 1 / 60);
    runner.update(world, 1 / 60);
    runner.update(world, 1 / 60);

    expect(runner.getTickCount()).toBe(3);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(logger.error).mock.calls[0][0]).toMatchObject({
      event: 'system_error',
      system: 'FailsOnSecond',
      tick: 2,
      error: 'second tick',
    });
  });

  it('lists registered systems with priorities', () => {
    runner.register(recordingSystem('ManaSystem', []), 100);
    expect(runner.getSystemNames()).toEqual(['ManaSystem (priority: 100)']);
  });
});
