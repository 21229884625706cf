import { LevelDataError, buildActorTimeline } from '@actor-timelines/level-data';
import { StepArena } from '@actor-timelines/timeline';
import { describe, expect, it } from 'vitest';

import { ActorBinding } from './actor-binding.js';
import { DEFAULT_ACTOR_MOTION_CONFIG, PEDESTRIAN_CATALOG, type ActorAction } from './actor-catalogs.js';
import { UnsupportedActionError } from './errors.js';
import { KinematicBody } from './kinematic-body.js';

function createBinding(arena = new StepArena<ActorAction>()) {
  const template = buildActorTimeline(
    [
      { kind: 'walk fast', length: 2, param: 0, cyclic: true },
      { kind: 'stand', length: 1 },
    ],
    (name) => PEDESTRIAN_CATALOG.resolve(name),
    { arena },
  );
  const body = new KinematicBody();
  const shadow = new KinematicBody({ x: 5, y: 5 });
  const binding = new ActorBinding({
    id: 'walker',
    index: 0,
    catalog: PEDESTRIAN_CATALOG,
    template,
    body,
    shadow,
    motion: DEFAULT_ACTOR_MOTION_CONFIG,
  });
  return { arena, binding, body, shadow };
}

function tickKinds(binding: ActorBinding, frames: number): (ActorAction | undefined)[] {
  return Array.from({ length: frames }, () => binding.tick()?.kind);
}

describe('ActorBinding', () => {
  it('runs a clone of its template and mirrors motion onto the shadow', () => {
    const { arena, binding, body, shadow } = createBinding();

    expect(arena.liveCount).toBe(4);
    expect(binding.tick()).toEqual({
      kind: 'WALK_FAST',
      param: 0,
      length: 2,
      elapsed: 0,
      remaining: 1,
      completed: false,
    });
    expect(body.velocity.toArray()).toEqual([2, 0]);
    expect(shadow.velocity.toArray()).toEqual([2, 0]);
    expect(shadow.position.toArray()).toEqual([5, 5]);

    expect(tickKinds(binding, 2)).toEqual(['WALK_FAST', 'STAND']);
    expect(body.velocity.toArray()).toEqual([0, 0]);
    expect(shadow.velocity.toArray()).toEqual([0, 0]);
  });

  it('forces validated action records and resumes the pattern fresh', () => {
    const { binding } = createBinding();
    binding.tick();

    binding.forceActions([{ kind: 'look around', length: 1, param: 0 }], true);

    expect(binding.state()).toBe('interrupted');
    expect(tickKinds(binding, 4)).toEqual(['LOOK_AROUND', 'WALK_FAST', 'WALK_FAST', 'STAND']);
  });

  it('rejects action names outside its catalog without touching the timeline', () => {
    const { arena, binding } = createBinding();

    expect(() => binding.forceActions([{ kind: 'go', length: 1 }], false)).toThrow(LevelDataError);
    expect(() => binding.control().force([{ kind: 'GO', length: 1 }], false)).toThrow(UnsupportedActionError);
    expect(binding.state()).toBe('cyclic');
    expect(arena.liveCount).toBe(4);
  });

  it('exposes a control that drives the live timeline', () => {
    const { binding } = createBinding();
    const control = binding.control();

    control.force([{ kind: 'STAND', length: 1 }], false);
    expect(control.advance().kind).toBe('STAND');
    expect(control.isEmpty()).toBe(false);
    control.reset();
    expect(tickKinds(binding, 3)).toEqual(['WALK_FAST', 'WALK_FAST', 'STAND']);
  });

  it('restarts from the template and releases everything on dispose', () => {
    const { arena, binding } = createBinding();
    binding.tick();
    binding.forceActions([{ kind: 'stand', length: 3 }], false);

    binding.restart();

    expect(binding.tick()?.elapsed).toBe(0);
    expect(arena.liveCount).toBe(4);
    binding.dispose();
    expect(arena.liveCount).toBe(0);
  });

  it('stops the body while idle', () => {
    const { binding, body, shadow } = createBinding();
    binding.tick();
    binding.halt();
    expect(body.velocity.toArray()).toEqual([0, 0]);
    expect(shadow.velocity.toArray()).toEqual([0, 0]);
  });
});
