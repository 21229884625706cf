/**
 * Level document types, after validation.
 */

import type { LevelDataError } from './errors.js';

/** One authored step, named the way the actor's catalog names it. */
export interface ActionRecord {
  kind: string;
  length: number;
  counter?: number;
  param?: number;
  /** Marks the first record of the repeating part of the timeline. */
  cyclic?: boolean;
}

export const ACTOR_TYPES = ['pedestrian', 'car', 'caster'] as const;

export type ActorType = (typeof ACTOR_TYPES)[number];

export interface LevelPoint {
  x: number;
  y: number;
}

export interface LevelActorData {
  id: string;
  type: ActorType;
  position: LevelPoint;
  /** Radians. */
  heading: number;
  actions: ActionRecord[];
  /** Position of the actor in the level file, kept for error reports. */
  index: number;
}

export interface LevelData {
  levelIndex: number;
  actors: LevelActorData[];
}

export interface LevelParseResult {
  level: LevelData;
  /** One entry per actor that was skipped. */
  errors: LevelDataError[];
}
