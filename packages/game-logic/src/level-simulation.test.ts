import { describe, expect, it, vi } from 'vitest';

import { createLevelSimulation, shadowId } from './level-simulation.js';

function createLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
  };
}

const LEVEL = {
  levelIndex: 1,
  actors: [
    {
      id: 'walker',
      type: 'pedestrian',
      actions: [
        { kind: 'stand', length: 1 },
        { kind: 'walk slow', length: 1, param: 0, cyclic: true },
      ],
    },
    { id: 'car-1', type: 'car', position: { x: 10, y: 0 }, actions: [{ kind: 'go', length: 2, cyclic: true }] },
    { id: 'broken', type: 'car', actions: [{ kind: 'fly', length: 1 }] },
    { type: 'tank', actions: [] },
  ],
};

describe('createLevelSimulation', () => {
  it('spawns valid actors and reports the rest', async () => {
    const logger = createLogger();
    const simulation = await createLevelSimulation(LEVEL, { logger });

    expect(simulation.level.levelIndex).toBe(1);
    expect(simulation.driver.actorIds()).toEqual(['walker', 'car-1']);
    expect(simulation.errors.map((error) => [error.actorIndex, error.field])).toEqual([
      [3, 'type'],
      [2, 'kind'],
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.debug).toHaveBeenCalledWith('[LevelSimulation] level 1: 2 actor(s) spawned, 2 skipped');
    expect(simulation.registry.names()).toEqual(['timeline-driver', 'kinematic-world']);
  });

  it('steps timelines and integrates motion frame by frame', async () => {
    const simulation = await createLevelSimulation(LEVEL, { logger: createLogger() });
    const trace: string[] = [];
    simulation.events.on('actor:step', ({ frame, actorId, step }) => trace.push(`${frame} ${actorId} ${step.kind}`));

    simulation.step(0.5);
    simulation.step(0.5);

    expect(trace).toEqual(['0 walker STAND', '0 car-1 GO', '1 walker WALK_SLOW', '1 car-1 GO']);
    expect(simulation.world.get('walker')?.position.toArray()).toEqual([0.5, 0]);
    expect(simulation.world.get('car-1')?.position.toArray()).toEqual([12, 0]);

    simulation.reset();

    expect(simulation.world.get('car-1')?.position.toArray()).toEqual([10, 0]);
    expect(simulation.driver.getFrameNumber()).toBe(0);
    simulation.step(0.5);
    expect(trace.at(-2)).toBe('0 walker STAND');
  });

  it('parks retired actors and their shadows until reset', async () => {
    const simulation = await createLevelSimulation(
      { actors: [{ id: 'p', type: 'pedestrian', actions: [{ kind: 'stand', length: 1 }] }] },
      {
        logger: createLogger(),
        config: { driver: { onTimelineExhausted: 'remove' }, shadows: true },
      },
    );
    expect(simulation.world.ids()).toEqual(['p', shadowId('p')]);

    simulation.step(0.5);
    simulation.step(0.5);

    expect(simulation.world.ids()).toEqual([]);
    expect(simulation.world.snapshot()).toEqual({});
    expect(simulation.driver.has('p')).toBe(false);

    simulation.reset();

    expect(simulation.world.ids()).toEqual(['p', shadowId('p')]);
    expect(simulation.driver.has('p')).toBe(true);
    const kinds: string[] = [];
    simulation.events.on('actor:step', ({ actorId, step }) => kinds.push(`${actorId} ${step.kind}`));
    simulation.step(0.5);
    expect(kinds).toEqual(['p STAND']);

    simulation.dispose();
    expect(simulation.arena.liveCount).toBe(0);
  });

  it('releases every step on dispose', async () => {
    const simulation = await createLevelSimulation(LEVEL, { logger: createLogger() });
    simulation.dispose();
    expect(simulation.arena.liveCount).toBe(0);
    expect(simulation.registry.names()).toEqual([]);
  });
});
