/**
 * @actor-timelines/level-data
 *
 * Level file validation and the authored-timeline build contract.
 */

export { buildActorTimeline, validateActionRecords } from './actions.js';
export type { BuildTimelineOptions } from './actions.js';

export { parseLevelFile } from './level-file.js';

export { LevelDataError, LevelFileError } from './errors.js';

export { ACTOR_TYPES } from './types.js';
export type { ActionRecord, ActorType, LevelActorData, LevelData, LevelParseResult, LevelPoint } from './types.js';
