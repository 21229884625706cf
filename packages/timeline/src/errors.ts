/**
 * Typed error classes for timeline construction and manipulation.
 */

import type { StepHandle } from './arena.js';

/** Base class for all timeline errors. */
export class TimelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimelineError';
  }
}

/** A step was described with a length, counter or param it can never run with. */
export class InvalidStepError extends TimelineError {
  constructor(
    public readonly field: 'length' | 'counter' | 'param',
    public readonly value: unknown,
    public readonly detail: string,
  ) {
    super(`Invalid step ${field} ${String(value)}: ${detail}`);
    this.name = 'InvalidStepError';
  }
}

/** A cyclic chain loops back to a step other than its declared anchor. */
export class MalformedCycleError extends TimelineError {
  constructor(detail: string) {
    super(`Malformed cycle: ${detail}`);
    this.name = 'MalformedCycleError';
  }
}

/**
 * `advance()` or `current()` was called on an empty timeline. Callers are
 * expected to check `isEmpty()` first, so this is a programming error.
 */
export class EmptyTimelineAccessError extends TimelineError {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation} an empty timeline`);
    this.name = 'EmptyTimelineAccessError';
  }
}

/** A handle outlived the step it pointed at. */
export class StaleStepHandleError extends TimelineError {
  constructor(public readonly handle: StepHandle) {
    super(`Step handle ${handle.index}@${handle.generation} no longer refers to a live step`);
    this.name = 'StaleStepHandleError';
  }
}
