/**
 * @actor-timelines/game-logic
 *
 * Actor catalogs and bindings, the timeline driver and kinematic world
 * subsystems, and level simulation assembly.
 */

export {
  ACTOR_CATALOGS,
  CAR_CATALOG,
  CASTER_CATALOG,
  DEFAULT_ACTOR_MOTION_CONFIG,
  PEDESTRIAN_ACTIONS,
  PEDESTRIAN_CATALOG,
  VEHICLE_ACTIONS,
} from './actor-catalogs.js';
export type {
  ActionBehavior,
  ActorAction,
  ActorCatalog,
  ActorMotionConfig,
  PedestrianAction,
  VehicleAction,
} from './actor-catalogs.js';

export { ActorBinding } from './actor-binding.js';
export type { ActorBindingOptions } from './actor-binding.js';

export { KinematicBody } from './kinematic-body.js';
export type { BodySnapshot, MovableBody } from './kinematic-body.js';

export { KinematicWorld } from './kinematic-world.js';

export { DEFAULT_TIMELINE_DRIVER_CONFIG, TimelineDriver } from './timeline-driver.js';
export type {
  ActorTimelineEvents,
  TimelineDriverConfig,
  TimelineDriverLogger,
  TimelineDriverOptions,
} from './timeline-driver.js';

export { DEFAULT_LEVEL_SIMULATION_CONFIG, createLevelSimulation, shadowId } from './level-simulation.js';
export type { LevelSimulation, LevelSimulationConfig, LevelSimulationOptions } from './level-simulation.js';

export { UnknownActorError, UnsupportedActionError } from './errors.js';
