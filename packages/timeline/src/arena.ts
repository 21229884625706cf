/**
 * Step storage: an arena of slots addressed by generational handles.
 *
 * Steps link to each other by handle rather than by object reference, so a
 * cyclic chain is just a set of slots whose `next` handles loop. Freeing a
 * chain means releasing its slots; nothing has to be unlinked first. A
 * released slot bumps its generation, which turns every handle still pointing
 * at it into a detectable stale handle.
 */

import { StaleStepHandleError } from './errors.js';
import { normalizeStep, type StepSpec, type StepView } from './step.js';

export interface StepHandle {
  readonly index: number;
  readonly generation: number;
}

export interface StepRecord<K> {
  kind: K;
  length: number;
  counter: number;
  param: number;
  next: StepHandle | null;
}

interface Slot<K> {
  generation: number;
  step: StepRecord<K> | null;
}

export function sameStep(a: StepHandle | null, b: StepHandle | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.index === b.index && a.generation === b.generation;
}

export class StepArena<K> {
  private readonly slots: Slot<K>[] = [];
  private readonly freeList: number[] = [];
  private live = 0;

  /** Validate `spec` and store it as an unlinked step. */
  allocate(spec: StepSpec<K>): StepHandle {
    const fields = normalizeStep(spec);
    const step: StepRecord<K> = { ...fields, next: null };

    const reused = this.freeList.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      if (slot) {
        slot.step = step;
        this.live += 1;
        return { index: reused, generation: slot.generation };
      }
    }

    const index = this.slots.length;
    this.slots.push({ generation: 0, step });
    this.live += 1;
    return { index, generation: 0 };
  }

  /** Resolve a handle, throwing on a stale or foreign one. */
  get(handle: StepHandle): StepRecord<K> {
    const step = this.tryGet(handle);
    if (!step) {
      throw new StaleStepHandleError(handle);
    }
    return step;
  }

  tryGet(handle: StepHandle): StepRecord<K> | undefined {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || slot.step === null) {
      return undefined;
    }
    return slot.step;
  }

  isLive(handle: StepHandle): boolean {
    return this.tryGet(handle) !== undefined;
  }

  view(handle: StepHandle): StepView<K> {
    const { kind, length, counter, param } = this.get(handle);
    return { kind, length, counter, param };
  }

  /** Point `from.next` at `to`. Used to assemble chains before wrapping them in a timeline. */
  link(from: StepHandle, to: StepHandle | null): void {
    if (to !== null) {
      this.get(to);
    }
    this.get(from).next = to;
  }

  release(handle: StepHandle): void {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || slot.step === null) {
      throw new StaleStepHandleError(handle);
    }
    slot.step = null;
    slot.generation += 1;
    this.freeList.push(handle.index);
    this.live -= 1;
  }

  /** Number of steps currently stored. */
  get liveCount(): number {
    return this.live;
  }

  /** Number of slots ever created, live or free. */
  get capacity(): number {
    return this.slots.length;
  }
}
