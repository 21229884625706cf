/**
 * Minimal kinematic body: position, velocity and facing angle.
 */

import * as THREE from 'three';

/** The surface a behavior table drives. */
export interface MovableBody {
  readonly position: THREE.Vector2;
  readonly velocity: THREE.Vector2;
  /** Facing, radians counter-clockwise from +x. */
  angle: number;
}

export interface BodySnapshot {
  x: number;
  y: number;
  vx: number;
  vy: number;
  angle: number;
}

export class KinematicBody implements MovableBody {
  readonly position = new THREE.Vector2();
  readonly velocity = new THREE.Vector2();
  angle: number;

  constructor(position: { x: number; y: number } = { x: 0, y: 0 }, angle = 0) {
    this.position.set(position.x, position.y);
    this.angle = angle;
  }

  /** Advance position by `dt` seconds of the current velocity. */
  integrate(dt: number): void {
    this.position.addScaledVector(this.velocity, dt);
  }

  /** Copy velocity and facing from another body, leaving position alone. */
  mirror(source: MovableBody): void {
    this.velocity.copy(source.velocity);
    this.angle = source.angle;
  }

  halt(): void {
    this.velocity.set(0, 0);
  }

  snapshot(): BodySnapshot {
    return {
      x: this.position.x,
      y: this.position.y,
      vx: this.velocity.x,
      vy: this.velocity.y,
      angle: this.angle,
    };
  }
}
