import { describe, expect, it } from 'vitest';

import { KinematicBody } from './kinematic-body.js';
import { KinematicWorld } from './kinematic-world.js';

describe('KinematicWorld', () => {
  it('integrates every body by its velocity', () => {
    const world = new KinematicWorld();
    const body = new KinematicBody({ x: 1, y: 1 });
    body.velocity.set(1, 2);
    world.add('a', body);

    world.update(0.5);

    expect(world.snapshot()).toEqual({ a: { x: 1.5, y: 2, vx: 1, vy: 2, angle: 0 } });
  });

  it('puts bodies back at their spawn pose on reset', () => {
    const world = new KinematicWorld();
    const body = new KinematicBody({ x: 3, y: 4 }, 0.5);
    world.add('a', body);
    body.velocity.set(2, 0);
    body.angle = 1;
    world.update(1);

    world.reset();

    expect(body.snapshot()).toEqual({ x: 3, y: 4, vx: 0, vy: 0, angle: 0.5 });
  });

  it('parks a body until reset and restores it at its spawn pose', () => {
    const world = new KinematicWorld();
    const body = new KinematicBody({ x: 3, y: 4 });
    world.add('a', body);
    world.add('b', new KinematicBody());
    body.velocity.set(2, 0);
    world.update(1);

    world.park('a');
    world.park('missing');
    world.update(1);

    expect(world.ids()).toEqual(['b']);
    expect(world.get('a')).toBeUndefined();
    expect(body.snapshot()).toEqual({ x: 5, y: 4, vx: 0, vy: 0, angle: 0 });

    world.reset();

    expect(world.ids()).toEqual(['a', 'b']);
    expect(world.get('a')?.snapshot()).toEqual({ x: 3, y: 4, vx: 0, vy: 0, angle: 0 });
  });

  it('tracks registration', () => {
    const world = new KinematicWorld();
    world.add('a', new KinematicBody());
    world.add('b', new KinematicBody());

    expect(() => world.add('a', new KinematicBody())).toThrow('Body "a" already registered');
    world.remove('a');
    expect(world.ids()).toEqual(['b']);
    expect(world.get('a')).toBeUndefined();

    world.dispose();
    expect(world.ids()).toEqual([]);
  });
});
