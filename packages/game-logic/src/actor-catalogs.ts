/**
 * Actor catalogs: per actor type, the action names level files may use and
 * the behavior each resolved step applies to the actor's body.
 *
 * Behaviors run once per frame with the step that frame resolved, so anything
 * spread over a step (a vehicle turn, a pedestrian looking around) is computed
 * from `elapsed` and `length`.
 */

import type { ActorType } from '@actor-timelines/level-data';
import type { ResolvedStep } from '@actor-timelines/timeline';
import * as THREE from 'three';

import { UnsupportedActionError } from './errors.js';
import type { MovableBody } from './kinematic-body.js';

export const PEDESTRIAN_ACTIONS = ['WALK_FAST', 'WALK_SLOW', 'STAND', 'LOOK_AROUND'] as const;
export const VEHICLE_ACTIONS = ['GO', 'STOP', 'TURN_LEFT', 'TURN_RIGHT'] as const;

export type PedestrianAction = (typeof PEDESTRIAN_ACTIONS)[number];
export type VehicleAction = (typeof VEHICLE_ACTIONS)[number];
export type ActorAction = PedestrianAction | VehicleAction;

export interface ActorMotionConfig {
  /** Units per second. */
  walkFastSpeed: number;
  walkSlowSpeed: number;
  carSpeed: number;
  casterSpeed: number;
  /** Radians turned over one whole turn step. */
  turnAngle: number;
  /** Peak deviation from the centre heading while looking around. */
  lookAroundAmplitude: number;
}

export const DEFAULT_ACTOR_MOTION_CONFIG: Readonly<ActorMotionConfig> = {
  walkFastSpeed: 2,
  walkSlowSpeed: 1,
  carSpeed: 2,
  casterSpeed: 2,
  turnAngle: Math.PI / 2,
  lookAroundAmplitude: Math.PI / 4,
};

export type ActionBehavior = (
  body: MovableBody,
  step: ResolvedStep<ActorAction>,
  config: ActorMotionConfig,
) => void;

export interface ActorCatalog {
  readonly type: ActorType;
  /** Names accepted in level files, in catalog order. */
  readonly actionNames: readonly string[];
  resolve(name: string): ActorAction | undefined;
  supports(kind: string): boolean;
  apply(body: MovableBody, step: ResolvedStep<ActorAction>, config: ActorMotionConfig): void;
}

const ORIGIN = new THREE.Vector2();

const halt: ActionBehavior = (body) => {
  body.velocity.set(0, 0);
};

function walk(speedOf: (config: ActorMotionConfig) => number): ActionBehavior {
  return (body, step, config) => {
    body.angle = step.param;
    body.velocity.set(Math.cos(step.param), Math.sin(step.param)).multiplyScalar(speedOf(config));
  };
}

const lookAround: ActionBehavior = (body, step, config) => {
  body.velocity.set(0, 0);
  body.angle = step.param + config.lookAroundAmplitude * Math.sin((2 * Math.PI * step.elapsed) / step.length);
};

function drive(speedOf: (config: ActorMotionConfig) => number): ActionBehavior {
  return (body, _step, config) => {
    body.velocity.set(Math.cos(body.angle), Math.sin(body.angle)).multiplyScalar(speedOf(config));
  };
}

/** Left is counter-clockwise. The velocity turns with the body. */
function turn(direction: 1 | -1): ActionBehavior {
  return (body, step, config) => {
    const delta = (direction * config.turnAngle) / step.length;
    body.angle += delta;
    body.velocity.rotateAround(ORIGIN, delta);
  };
}

function defineCatalog<K extends ActorAction>(
  type: ActorType,
  names: Readonly<Record<string, K>>,
  behaviors: Readonly<Record<K, ActionBehavior>>,
): ActorCatalog {
  const byName = new Map<string, ActorAction>(Object.entries(names));
  const table = new Map<string, ActionBehavior>(Object.entries<ActionBehavior>(behaviors));

  return {
    type,
    actionNames: [...byName.keys()],
    resolve: (name) => byName.get(name),
    supports: (kind) => table.has(kind),
    apply(body, step, config) {
      const behavior = table.get(step.kind);
      if (!behavior) {
        throw new UnsupportedActionError(type, step.kind);
      }
      behavior(body, step, config);
    },
  };
}

export const PEDESTRIAN_CATALOG = defineCatalog<PedestrianAction>(
  'pedestrian',
  {
    'walk fast': 'WALK_FAST',
    'walk slow': 'WALK_SLOW',
    stand: 'STAND',
    'look around': 'LOOK_AROUND',
  },
  {
    WALK_FAST: walk((config) => config.walkFastSpeed),
    WALK_SLOW: walk((config) => config.walkSlowSpeed),
    STAND: halt,
    LOOK_AROUND: lookAround,
  },
);

export const CAR_CATALOG = defineCatalog<VehicleAction>(
  'car',
  {
    go: 'GO',
    stop: 'STOP',
    'turn left': 'TURN_LEFT',
    'turn right': 'TURN_RIGHT',
  },
  {
    GO: drive((config) => config.carSpeed),
    STOP: halt,
    TURN_LEFT: turn(1),
    TURN_RIGHT: turn(-1),
  },
);

export const CASTER_CATALOG = defineCatalog<VehicleAction>(
  'caster',
  {
    go: 'GO',
    stop: 'STOP',
    left: 'TURN_LEFT',
    right: 'TURN_RIGHT',
  },
  {
    GO: drive((config) => config.casterSpeed),
    STOP: halt,
    TURN_LEFT: turn(1),
    TURN_RIGHT: turn(-1),
  },
);

export const ACTOR_CATALOGS: Readonly<Record<ActorType, ActorCatalog>> = {
  pedestrian: PEDESTRIAN_CATALOG,
  car: CAR_CATALOG,
  caster: CASTER_CATALOG,
};
