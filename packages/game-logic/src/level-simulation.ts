/**
 * Level simulation assembly: parse a level, build each actor's authored
 * timeline, and wire the driver and world subsystems together.
 */

import { EventBus, SubsystemRegistry } from '@actor-timelines/engine';
import {
  LevelDataError,
  buildActorTimeline,
  parseLevelFile,
  type LevelActorData,
  type LevelData,
} from '@actor-timelines/level-data';
import { StepArena, type Timeline } from '@actor-timelines/timeline';

import { ActorBinding } from './actor-binding.js';
import {
  ACTOR_CATALOGS,
  DEFAULT_ACTOR_MOTION_CONFIG,
  type ActorAction,
  type ActorMotionConfig,
} from './actor-catalogs.js';
import { KinematicBody } from './kinematic-body.js';
import { KinematicWorld } from './kinematic-world.js';
import {
  DEFAULT_TIMELINE_DRIVER_CONFIG,
  TimelineDriver,
  type ActorTimelineEvents,
  type TimelineDriverConfig,
  type TimelineDriverLogger,
} from './timeline-driver.js';

export interface LevelSimulationConfig {
  motion: ActorMotionConfig;
  driver: TimelineDriverConfig;
  /** Give every actor a shadow body that mirrors its motion. */
  shadows: boolean;
}

export const DEFAULT_LEVEL_SIMULATION_CONFIG: Readonly<LevelSimulationConfig> = {
  motion: DEFAULT_ACTOR_MOTION_CONFIG,
  driver: DEFAULT_TIMELINE_DRIVER_CONFIG,
  shadows: false,
};

export interface LevelSimulationOptions {
  config?: Partial<LevelSimulationConfig>;
  logger?: TimelineDriverLogger;
}

export interface LevelSimulation {
  readonly level: LevelData;
  /** Actors left out of the simulation, one entry each. */
  readonly errors: readonly LevelDataError[];
  readonly arena: StepArena<ActorAction>;
  readonly registry: SubsystemRegistry;
  readonly driver: TimelineDriver;
  readonly world: KinematicWorld;
  readonly events: EventBus<ActorTimelineEvents>;
  /** Run one simulation frame of `dt` seconds. */
  step(dt: number): void;
  reset(): void;
  dispose(): void;
}

export function shadowId(actorId: string): string {
  return `${actorId}#shadow`;
}

export async function createLevelSimulation(
  raw: unknown,
  options: LevelSimulationOptions = {},
): Promise<LevelSimulation> {
  const config: LevelSimulationConfig = { ...DEFAULT_LEVEL_SIMULATION_CONFIG, ...options.config };
  const logger = options.logger ?? console;
  const { level, errors: parseErrors } = parseLevelFile(raw);
  const errors = [...parseErrors];
  for (const error of parseErrors) {
    logger.warn(`[LevelSimulation] skipped actor: ${error.message}`);
  }

  const arena = new StepArena<ActorAction>();
  const events = new EventBus<ActorTimelineEvents>();
  const driver = new TimelineDriver({ events, config: config.driver, logger });
  const world = new KinematicWorld();
  const registry = new SubsystemRegistry();
  // The driver sets velocities that the world then integrates.
  registry.register(driver);
  registry.register(world);

  const buildTemplate = (actor: LevelActorData): Timeline<ActorAction> | null => {
    const catalog = ACTOR_CATALOGS[actor.type];
    try {
      return buildActorTimeline(actor.actions, (name) => catalog.resolve(name), {
        arena,
        actorIndex: actor.index,
      });
    } catch (error) {
      if (!(error instanceof LevelDataError)) {
        throw error;
      }
      errors.push(error);
      logger.warn(`[LevelSimulation] skipped actor "${actor.id}": ${error.message}`);
      return null;
    }
  };

  const spawned: LevelActorData[] = [];
  for (const actor of level.actors) {
    const catalog = ACTOR_CATALOGS[actor.type];
    const template = buildTemplate(actor);
    if (template === null) {
      continue;
    }

    const body = new KinematicBody(actor.position, actor.heading);
    world.add(actor.id, body);
    let shadow: KinematicBody | null = null;
    if (config.shadows) {
      shadow = new KinematicBody(actor.position, actor.heading);
      world.add(shadowId(actor.id), shadow);
    }

    driver.bind(
      new ActorBinding({ id: actor.id, index: actor.index, catalog, template, body, shadow, motion: config.motion }),
    );
    spawned.push(actor);
  }

  events.on('actor:retired', ({ actorId }) => {
    world.park(actorId);
    world.park(shadowId(actorId));
  });

  await registry.initAll();
  await registry.postProcessLoadAll();
  logger.debug(
    `[LevelSimulation] level ${level.levelIndex}: ${spawned.length} actor(s) spawned, ${errors.length} skipped`,
  );

  return {
    level: { levelIndex: level.levelIndex, actors: spawned },
    errors,
    arena,
    registry,
    driver,
    world,
    events,
    step: (dt) => registry.updateAll(dt),
    reset: () => registry.resetAll(),
    dispose: () => {
      registry.disposeAll();
      events.removeAllListeners();
    },
  };
}
