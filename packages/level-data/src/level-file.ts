/**
 * Level document parsing.
 *
 * A malformed document throws `LevelFileError`. A malformed actor is reported
 * as a `LevelDataError` in the result and left out of the level.
 */

import { isRecord, validateActionRecords } from './actions.js';
import { LevelDataError, LevelFileError } from './errors.js';
import { ACTOR_TYPES, type ActorType, type LevelActorData, type LevelParseResult, type LevelPoint } from './types.js';

function isActorType(value: unknown): value is ActorType {
  return ACTOR_TYPES.some((type) => type === value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function parseLevelFile(raw: unknown): LevelParseResult {
  if (!isRecord(raw)) {
    throw new LevelFileError('document', 'must be a JSON object');
  }

  const levelIndex = raw['levelIndex'] ?? 0;
  if (typeof levelIndex !== 'number' || !Number.isInteger(levelIndex) || levelIndex < 0) {
    throw new LevelFileError('levelIndex', `must be a non-negative integer, got ${String(levelIndex)}`);
  }

  const rawActors = raw['actors'];
  if (!Array.isArray(rawActors)) {
    throw new LevelFileError('actors', 'must be an array');
  }

  const actors: LevelActorData[] = [];
  const errors: LevelDataError[] = [];
  const seenIds = new Set<string>();

  rawActors.forEach((entry: unknown, index) => {
    try {
      const actor = parseActor(entry, index);
      if (seenIds.has(actor.id)) {
        throw new LevelDataError(index, 'id', `duplicate actor id "${actor.id}"`);
      }
      seenIds.add(actor.id);
      actors.push(actor);
    } catch (error) {
      if (!(error instanceof LevelDataError)) {
        throw error;
      }
      errors.push(error);
    }
  });

  return { level: { levelIndex, actors }, errors };
}

function parseActor(entry: unknown, index: number): LevelActorData {
  if (!isRecord(entry)) {
    throw new LevelDataError(index, 'actor', 'must be an object');
  }

  const type = entry['type'];
  if (!isActorType(type)) {
    throw new LevelDataError(index, 'type', `must be one of ${ACTOR_TYPES.join(', ')}, got ${String(type)}`);
  }

  const id = entry['id'] ?? `${type}-${index}`;
  if (typeof id !== 'string' || id === '') {
    throw new LevelDataError(index, 'id', 'must be a non-empty string');
  }

  const heading = entry['heading'] ?? 0;
  if (!isFiniteNumber(heading)) {
    throw new LevelDataError(index, 'heading', `must be a finite number, got ${String(heading)}`);
  }

  return {
    id,
    type,
    position: parsePosition(entry['position'], index),
    heading,
    actions: validateActionRecords(entry['actions'], index),
    index,
  };
}

function parsePosition(raw: unknown, index: number): LevelPoint {
  if (raw === undefined) {
    return { x: 0, y: 0 };
  }
  const { x, y } = isRecord(raw) ? raw : { x: undefined, y: undefined };
  if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
    throw new LevelDataError(index, 'position', 'must be an object with finite x and y');
  }
  return { x, y };
}
