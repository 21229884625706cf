/**
 * KinematicWorld: integrates every registered body once per frame.
 */

import type { Subsystem } from '@actor-timelines/engine';

import { KinematicBody, type BodySnapshot } from './kinematic-body.js';

interface SpawnPose {
  x: number;
  y: number;
  angle: number;
}

export class KinematicWorld implements Subsystem {
  readonly name = 'kinematic-world';

  private readonly bodies = new Map<string, KinematicBody>();
  private readonly spawns = new Map<string, SpawnPose>();
  private readonly parked = new Set<string>();

  init(): void {}

  /** Register a body; its current pose is where `reset()` puts it back. */
  add(id: string, body: KinematicBody): void {
    if (this.bodies.has(id)) {
      throw new Error(`Body "${id}" already registered`);
    }
    this.bodies.set(id, body);
    this.spawns.set(id, { x: body.position.x, y: body.position.y, angle: body.angle });
  }

  remove(id: string): void {
    this.bodies.delete(id);
    this.spawns.delete(id);
    this.parked.delete(id);
  }

  /** Take a body out of the simulation until the next `reset()`. */
  park(id: string): void {
    const body = this.bodies.get(id);
    if (!body) {
      return;
    }
    body.halt();
    this.parked.add(id);
  }

  get(id: string): KinematicBody | undefined {
    return this.parked.has(id) ? undefined : this.bodies.get(id);
  }

  ids(): string[] {
    return [...this.bodies.keys()].filter((id) => !this.parked.has(id));
  }

  snapshot(): Record<string, BodySnapshot> {
    const result: Record<string, BodySnapshot> = {};
    for (const [id, body] of this.bodies) {
      if (!this.parked.has(id)) {
        result[id] = body.snapshot();
      }
    }
    return result;
  }

  update(dt: number): void {
    for (const [id, body] of this.bodies) {
      if (!this.parked.has(id)) {
        body.integrate(dt);
      }
    }
  }

  reset(): void {
    this.parked.clear();
    for (const [id, body] of this.bodies) {
      const spawn = this.spawns.get(id);
      if (spawn) {
        body.position.set(spawn.x, spawn.y);
        body.angle = spawn.angle;
      }
      body.halt();
    }
  }

  dispose(): void {
    this.bodies.clear();
    this.spawns.clear();
    this.parked.clear();
  }
}
