/**
 * @actor-timelines/timeline
 *
 * Frame-counted step timelines: finite or cyclic, interruptible, resumable.
 */

export { StepArena, sameStep } from './arena.js';
export type { StepHandle, StepRecord } from './arena.js';

export { DEFAULT_STEP_PARAM, MAX_STEP_LENGTH, normalizeStep } from './step.js';
export type { ResolvedStep, StepFields, StepSpec, StepView } from './step.js';

export { Timeline } from './timeline.js';
export type { TimelineControl, TimelineOptions, TimelineState } from './timeline.js';

export {
  EmptyTimelineAccessError,
  InvalidStepError,
  MalformedCycleError,
  StaleStepHandleError,
  TimelineError,
} from './errors.js';
