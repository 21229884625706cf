/**
 * Action records: validation and the timeline build contract.
 *
 * Records before the first `cyclic: true` record play once as a prefix. The
 * flagged record and everything after it form the repeating pattern, which
 * the actor enters once the prefix is done. A list without a flagged record
 * builds a finite timeline.
 */

import {
  InvalidStepError,
  MAX_STEP_LENGTH,
  StepArena,
  Timeline,
  normalizeStep,
  type StepSpec,
} from '@actor-timelines/timeline';

import { LevelDataError } from './errors.js';
import type { ActionRecord } from './types.js';

export interface BuildTimelineOptions<K> {
  arena?: StepArena<K>;
  /** Reported in errors. */
  actorIndex?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateActionRecords(raw: unknown, actorIndex: number): ActionRecord[] {
  if (!Array.isArray(raw)) {
    throw new LevelDataError(actorIndex, 'actions', 'must be an array');
  }

  return raw.map((entry: unknown, recordIndex) => {
    const fail = (field: string, detail: string): LevelDataError =>
      new LevelDataError(actorIndex, field, detail, recordIndex);

    if (!isRecord(entry)) {
      throw fail('action', 'must be an object');
    }

    const { kind, length, counter, param, cyclic } = entry;
    if (typeof kind !== 'string' || kind.trim() === '') {
      throw fail('kind', 'must be a non-empty string');
    }
    if (typeof length !== 'number' || !Number.isInteger(length) || length <= 0) {
      throw fail('length', `must be a positive integer, got ${String(length)}`);
    }
    if (length > MAX_STEP_LENGTH) {
      throw fail('length', `must be at most ${MAX_STEP_LENGTH}, got ${String(length)}`);
    }

    const record: ActionRecord = { kind, length };
    if (counter !== undefined) {
      if (typeof counter !== 'number' || !Number.isInteger(counter) || counter < 1 || counter > length) {
        throw fail('counter', `must be an integer in [1, ${length}], got ${String(counter)}`);
      }
      record.counter = counter;
    }
    if (param !== undefined) {
      if (typeof param !== 'number' || !Number.isFinite(param)) {
        throw fail('param', `must be a finite number, got ${String(param)}`);
      }
      record.param = param;
    }
    if (cyclic !== undefined) {
      if (typeof cyclic !== 'boolean') {
        throw fail('cyclic', 'must be a boolean');
      }
      record.cyclic = cyclic;
    }
    return record;
  });
}

/**
 * Build an actor's authored timeline. `resolveKind` maps a record's name to
 * the catalog's kind, or `undefined` when the actor type has no such action.
 */
export function buildActorTimeline<K>(
  records: readonly ActionRecord[],
  resolveKind: (name: string) => K | undefined,
  options: BuildTimelineOptions<K> = {},
): Timeline<K> {
  const actorIndex = options.actorIndex ?? 0;
  const arena = options.arena ?? new StepArena<K>();

  const specs = records.map((record, recordIndex): StepSpec<K> => {
    const kind = resolveKind(record.kind);
    if (kind === undefined) {
      throw new LevelDataError(actorIndex, 'kind', `unknown action "${record.kind}"`, recordIndex);
    }
    const spec: StepSpec<K> = { kind, length: record.length, counter: record.counter, param: record.param };
    try {
      normalizeStep(spec);
    } catch (error) {
      if (!(error instanceof InvalidStepError)) {
        throw error;
      }
      throw new LevelDataError(actorIndex, error.field, `${error.detail}, got ${String(error.value)}`, recordIndex);
    }
    return spec;
  });

  // All steps are validated; allocation starts here.
  const cycleStart = records.findIndex((record) => record.cyclic === true);
  if (cycleStart < 0) {
    return Timeline.from(specs, { arena });
  }

  const prefix = Timeline.from(specs.slice(0, cycleStart), { arena });
  const suffix = Timeline.from(specs.slice(cycleStart), { arena, cyclic: true });
  prefix.concat(suffix);
  return prefix;
}
