/**
 * Step descriptions and validation.
 *
 * A step is one scheduled behavior: `kind` is an opaque tag the caller's
 * behavior table understands, `length` is how many frames it lasts, `counter`
 * is how many of those frames are left, and `param` carries a free value such
 * as a heading.
 */

import { InvalidStepError } from './errors.js';

export const DEFAULT_STEP_PARAM = 0;

/** Longest step, in frames. Counters beyond this no longer count down exactly. */
export const MAX_STEP_LENGTH = 0xffffffff;

export interface StepSpec<K> {
  kind: K;
  length: number;
  /** Frames left when the step starts. Defaults to `length`. */
  counter?: number;
  param?: number;
}

/** Read-only snapshot of a step. */
export interface StepView<K> {
  readonly kind: K;
  readonly length: number;
  readonly counter: number;
  readonly param: number;
}

/** The outcome of running one frame of a step. */
export interface ResolvedStep<K> {
  readonly kind: K;
  readonly param: number;
  readonly length: number;
  /** Zero-based frame index within the step. */
  readonly elapsed: number;
  /** Frames left after this one. */
  readonly remaining: number;
  /** True when this frame used up the step's counter. */
  readonly completed: boolean;
}

export interface StepFields<K> {
  kind: K;
  length: number;
  counter: number;
  param: number;
}

/** Validate a step description and fill in its defaults. Never clamps. */
export function normalizeStep<K>(spec: StepSpec<K>): StepFields<K> {
  const { kind, length } = spec;
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidStepError('length', length, 'must be a positive integer');
  }
  if (length > MAX_STEP_LENGTH) {
    throw new InvalidStepError('length', length, `must be at most ${MAX_STEP_LENGTH}`);
  }

  const counter = spec.counter ?? length;
  if (!Number.isInteger(counter) || counter < 1 || counter > length) {
    throw new InvalidStepError('counter', counter, `must be an integer in [1, ${length}]`);
  }

  const param = spec.param ?? DEFAULT_STEP_PARAM;
  if (!Number.isFinite(param)) {
    throw new InvalidStepError('param', param, 'must be a finite number');
  }

  return { kind, length, counter, param };
}
