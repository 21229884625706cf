import { describe, expect, it } from 'vitest';

import { StepArena, sameStep } from './arena.js';
import { InvalidStepError, StaleStepHandleError } from './errors.js';

describe('StepArena', () => {
  it('allocates validated, unlinked steps', () => {
    const arena = new StepArena<string>();
    const handle = arena.allocate({ kind: 'idle', length: 2 });

    expect(arena.get(handle)).toEqual({ kind: 'idle', length: 2, counter: 2, param: 0, next: null });
    expect(arena.liveCount).toBe(1);
    expect(() => arena.allocate({ kind: 'idle', length: 0 })).toThrow(InvalidStepError);
    expect(arena.liveCount).toBe(1);
  });

  it('reuses released slots under a new generation', () => {
    const arena = new StepArena<string>();
    const first = arena.allocate({ kind: 'a', length: 1 });
    arena.release(first);
    const second = arena.allocate({ kind: 'b', length: 1 });

    expect(second.index).toBe(first.index);
    expect(second.generation).toBe(first.generation + 1);
    expect(sameStep(first, second)).toBe(false);
    expect(arena.capacity).toBe(1);
    expect(arena.isLive(first)).toBe(false);
    expect(arena.view(second).kind).toBe('b');
  });

  it('rejects stale handles on access and double release', () => {
    const arena = new StepArena<string>();
    const handle = arena.allocate({ kind: 'a', length: 1 });
    arena.release(handle);

    expect(() => arena.get(handle)).toThrow(StaleStepHandleError);
    expect(() => arena.release(handle)).toThrow('Step handle 0@0 no longer refers to a live step');
    expect(arena.tryGet(handle)).toBeUndefined();
    expect(arena.liveCount).toBe(0);
  });

  it('links steps and refuses to link to a stale target', () => {
    const arena = new StepArena<string>();
    const a = arena.allocate({ kind: 'a', length: 1 });
    const b = arena.allocate({ kind: 'b', length: 1 });
    arena.link(a, b);
    expect(sameStep(arena.get(a).next, b)).toBe(true);

    arena.release(b);
    expect(() => arena.link(a, b)).toThrow(StaleStepHandleError);
    arena.link(a, null);
    expect(arena.get(a).next).toBeNull();
  });

  it('compares null handles', () => {
    expect(sameStep(null, null)).toBe(true);
    expect(sameStep(null, { index: 0, generation: 0 })).toBe(false);
  });
});
