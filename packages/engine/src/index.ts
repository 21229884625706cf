/**
 * @actor-timelines/engine
 *
 * Frame loop, subsystem lifecycle and event plumbing shared by the simulation.
 */

export type { Subsystem } from './subsystem.js';
export { SubsystemRegistry } from './subsystem.js';

export { EventBus } from './event-bus.js';
export type { EventCallback } from './event-bus.js';

export { GameLoop, createTimerScheduler } from './game-loop.js';
export type { GameLoopCallbacks, GameLoopScheduler } from './game-loop.js';
