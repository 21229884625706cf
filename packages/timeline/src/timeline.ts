/**
 * Timeline: an ordered, possibly cyclic chain of steps run one frame at a time.
 *
 * Three handles describe the chain:
 * - `head` is the step currently executing.
 * - `tail` is the last step reachable without revisiting the anchor. Its
 *   `next` is either null (the timeline ends) or the anchor (it repeats).
 * - `anchor` is where the default pattern begins. It only differs from `head`
 *   while an interruption or a one-shot prefix is playing ahead of that
 *   pattern; otherwise it moves with `head`.
 *
 * The AI layer splices interrupts in with `force()`. Interrupts link their last
 * step back into the default pattern, so once they play out the actor picks up
 * its cycle again. Steps the timeline stops reaching are released back to the
 * arena by the operation that dropped them.
 */

import { StepArena, sameStep, type StepHandle, type StepRecord } from './arena.js';
import { EmptyTimelineAccessError, MalformedCycleError, TimelineError } from './errors.js';
import { normalizeStep, type ResolvedStep, type StepSpec, type StepView } from './step.js';

export type TimelineState = 'empty' | 'finite' | 'cyclic' | 'interrupted';

/** The operations AI code needs, and nothing that reaches into the chain. */
export interface TimelineControl<K> {
  advance(): ResolvedStep<K>;
  force(interrupt: Timeline<K> | readonly StepSpec<K>[], fromBeginning: boolean): void;
  reset(): void;
  isEmpty(): boolean;
}

export interface TimelineOptions<K> {
  arena?: StepArena<K>;
  /** Close the loop from the last step back to the first. */
  cyclic?: boolean;
}

interface ChainEnds {
  head: StepHandle;
  tail: StepHandle;
  anchor: StepHandle;
  cyclic: boolean;
}

export class Timeline<K> implements TimelineControl<K> {
  private head: StepHandle | null = null;
  private tail: StepHandle | null = null;
  private anchor: StepHandle | null = null;

  constructor(readonly arena: StepArena<K> = new StepArena<K>()) {}

  static from<K>(specs: readonly StepSpec<K>[], options: TimelineOptions<K> = {}): Timeline<K> {
    // Validate every step before allocating any.
    for (const spec of specs) {
      normalizeStep(spec);
    }
    const timeline = new Timeline<K>(options.arena);
    for (const spec of specs) {
      timeline.append(spec);
    }
    if (options.cyclic) {
      timeline.setCycling(true);
    }
    return timeline;
  }

  /**
   * Wrap a chain already linked in `arena`. The chain may end, or loop back to
   * `anchor`; looping back anywhere else is rejected.
   */
  static fromChain<K>(arena: StepArena<K>, entry: StepHandle, anchor: StepHandle = entry): Timeline<K> {
    const timeline = new Timeline<K>(arena);
    const tail = timeline.locateTail(entry, anchor);
    timeline.head = entry;
    timeline.tail = tail;
    timeline.anchor = anchor;
    return timeline;
  }

  isEmpty(): boolean {
    return this.head === null;
  }

  isCyclic(): boolean {
    return this.tail !== null && this.arena.get(this.tail).next !== null;
  }

  isInterrupted(): boolean {
    return this.head !== null && !sameStep(this.head, this.anchor);
  }

  state(): TimelineState {
    if (this.head === null) {
      return 'empty';
    }
    if (this.isInterrupted()) {
      return 'interrupted';
    }
    return this.isCyclic() ? 'cyclic' : 'finite';
  }

  current(): StepView<K> {
    return this.arena.view(this.requireHead('read the current step of'));
  }

  /** Handles of one lap of the chain, starting at the head. */
  chain(): StepHandle[] {
    const handles: StepHandle[] = [];
    const seen = new Set<number>();
    let cursor = this.head;
    while (cursor !== null && !seen.has(cursor.index)) {
      seen.add(cursor.index);
      handles.push(cursor);
      cursor = this.arena.get(cursor).next;
    }
    return handles;
  }

  steps(): StepView<K>[] {
    return this.chain().map((handle) => this.arena.view(handle));
  }

  size(): number {
    return this.chain().length;
  }

  append(spec: StepSpec<K>): StepHandle {
    const handle = this.arena.allocate(spec);
    if (this.head === null) {
      this.head = handle;
      this.tail = handle;
      this.anchor = handle;
      return handle;
    }

    // A fresh step has no successor, so appending to a cyclic timeline opens it.
    this.arena.get(this.requireTail()).next = handle;
    this.tail = handle;
    return handle;
  }

  /**
   * Splice `other` onto the end of this timeline. A cyclic `other` becomes the
   * new repeating pattern. `other` is left empty.
   */
  concat(other: Timeline<K>): void {
    this.verifyClosure();
    const incoming = this.takeOver(other);
    if (!incoming) {
      return;
    }
    if (this.head === null) {
      this.assign(incoming);
      return;
    }

    this.arena.get(this.requireTail()).next = incoming.head;
    if (incoming.cyclic) {
      this.anchor = incoming.anchor;
    }
    this.tail = incoming.tail;
  }

  /** Run one frame of the head step. The counter drops after the step resolves. */
  advance(): ResolvedStep<K> {
    const handle = this.requireHead('advance');
    const step = this.arena.get(handle);
    const resolved: ResolvedStep<K> = {
      kind: step.kind,
      param: step.param,
      length: step.length,
      elapsed: step.length - step.counter,
      remaining: step.counter - 1,
      completed: step.counter === 1,
    };

    step.counter -= 1;
    if (step.counter === 0) {
      this.pop(handle, step);
    }
    return resolved;
  }

  /**
   * Play `interrupt` ahead of the current position.
   *
   * A cyclic interrupt replaces the whole timeline. A finite one links back
   * into this timeline: to the anchor, re-armed, when `fromBeginning` is set
   * (dropping anything forced earlier that has not run yet), or to the current
   * head with its counter intact otherwise (stacking ahead of earlier
   * interrupts). `interrupt` is left empty when it is a timeline.
   */
  force(interrupt: Timeline<K> | readonly StepSpec<K>[], fromBeginning: boolean): void {
    this.verifyClosure();
    const source = interrupt instanceof Timeline ? interrupt : Timeline.from(interrupt, { arena: this.arena });

    if (this.head === null) {
      const incoming = this.takeOver(source);
      if (incoming) {
        this.assign(incoming);
      }
      return;
    }

    if (source.isCyclic()) {
      const dropped = this.chain();
      const incoming = this.takeOver(source);
      if (incoming) {
        this.assign(incoming);
        this.releaseUnreachable(dropped);
      }
      return;
    }

    const resumeAt = fromBeginning ? this.requireAnchor() : this.requireHead('force');
    const dropped = fromBeginning ? this.chain() : [];
    const incoming = this.takeOver(source);
    if (!incoming) {
      return;
    }

    this.arena.get(incoming.tail).next = resumeAt;
    if (fromBeginning) {
      rearm(this.arena.get(resumeAt));
    }
    this.head = incoming.head;
    this.releaseUnreachable(dropped);
  }

  /** Abandon any interruption and restart the default pattern at its anchor. */
  reset(): void {
    if (this.head === null) {
      return;
    }
    this.verifyClosure();
    const anchor = this.requireAnchor();
    const dropped = this.chain();
    const tail = this.locateTail(anchor, anchor);

    this.head = anchor;
    this.tail = tail;
    rearm(this.arena.get(anchor));
    this.releaseUnreachable(dropped);
  }

  /**
   * Close the loop at the current head, which becomes the anchor, or open it
   * so the timeline ends after the current lap.
   */
  setCycling(on: boolean): void {
    if (this.head === null) {
      return;
    }
    const tailStep = this.arena.get(this.requireTail());
    if (on) {
      tailStep.next = this.head;
      this.anchor = this.head;
    } else {
      tailStep.next = null;
    }
  }

  /** Deep copy, counters included, into `arena` (this timeline's by default). */
  clone(arena: StepArena<K> = this.arena): Timeline<K> {
    const copy = new Timeline<K>(arena);
    const handles = this.chain();
    if (handles.length === 0) {
      return copy;
    }

    const copies = new Map<number, StepHandle>();
    for (const handle of handles) {
      const { kind, length, counter, param } = this.arena.get(handle);
      copies.set(handle.index, arena.allocate({ kind, length, counter, param }));
    }
    const copyOf = (handle: StepHandle | null): StepHandle => {
      const mapped = handle === null ? undefined : copies.get(handle.index);
      if (!mapped) {
        throw new TimelineError('timeline handle points outside its own chain');
      }
      return mapped;
    };

    for (const handle of handles) {
      const next = this.arena.get(handle).next;
      arena.get(copyOf(handle)).next = next === null ? null : copyOf(next);
    }
    copy.head = copyOf(this.head);
    copy.tail = copyOf(this.tail);
    copy.anchor = copyOf(this.anchor);
    return copy;
  }

  /** Release every step this timeline reaches and leave it empty. */
  dispose(): void {
    for (const handle of this.chain()) {
      this.arena.release(handle);
    }
    this.head = null;
    this.tail = null;
    this.anchor = null;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private pop(handle: StepHandle, step: StepRecord<K>): void {
    const lap = sameStep(this.arena.get(this.requireTail()).next, handle);
    if (lap) {
      // Completing the cycle entry: the tail trails one step behind the head.
      this.tail = handle;
    } else if (sameStep(this.tail, handle) && step.next === null) {
      this.tail = null;
    }

    this.head = step.next;
    if (sameStep(this.anchor, handle)) {
      this.anchor = this.head;
    }
    if (this.head === null) {
      this.tail = null;
      this.anchor = null;
    }

    if (lap || this.reaches(handle)) {
      rearm(step);
    } else {
      this.arena.release(handle);
    }
  }

  /** Detach `other`'s chain for splicing into this timeline, moving it across arenas if needed. */
  private takeOver(other: Timeline<K>): ChainEnds | null {
    if (other === this) {
      throw new TimelineError('cannot splice a timeline into itself');
    }
    other.verifyClosure();
    const source = other.arena === this.arena ? other : other.moveInto(this.arena);
    const { head, tail, anchor } = source;
    if (head === null || tail === null || anchor === null) {
      return null;
    }

    const ends: ChainEnds = { head, tail, anchor, cyclic: source.isCyclic() };
    source.head = null;
    source.tail = null;
    source.anchor = null;
    return ends;
  }

  private moveInto(arena: StepArena<K>): Timeline<K> {
    const moved = this.clone(arena);
    this.dispose();
    return moved;
  }

  private assign(ends: ChainEnds): void {
    this.head = ends.head;
    this.tail = ends.tail;
    this.anchor = ends.anchor;
  }

  private verifyClosure(): void {
    if (this.tail === null) {
      return;
    }
    const next = this.arena.get(this.tail).next;
    if (next !== null && !sameStep(next, this.anchor)) {
      throw new MalformedCycleError(
        `tail step ${this.tail.index} links to step ${next.index} instead of anchor ${this.anchor?.index ?? 'none'}`,
      );
    }
  }

  /** Walk from `entry` to the step whose `next` is null or `closeAt`. */
  private locateTail(entry: StepHandle, closeAt: StepHandle): StepHandle {
    const seen = new Set<number>();
    let sawAnchor = false;
    let cursor = entry;
    for (;;) {
      seen.add(cursor.index);
      sawAnchor ||= sameStep(cursor, closeAt);
      const next = this.arena.get(cursor).next;
      if (next === null) {
        if (!sawAnchor) {
          throw new TimelineError(`anchor step ${closeAt.index} is not reachable from step ${entry.index}`);
        }
        return cursor;
      }
      if (sawAnchor && sameStep(next, closeAt)) {
        return cursor;
      }
      if (seen.has(next.index)) {
        throw new MalformedCycleError(
          `chain loops back to step ${next.index} instead of anchor ${closeAt.index}`,
        );
      }
      cursor = next;
    }
  }

  private reaches(handle: StepHandle): boolean {
    return this.chain().some((candidate) => sameStep(candidate, handle));
  }

  private releaseUnreachable(candidates: readonly StepHandle[]): void {
    if (candidates.length === 0) {
      return;
    }
    const kept = new Set(this.chain().map((handle) => handle.index));
    for (const handle of candidates) {
      if (!kept.has(handle.index) && this.arena.isLive(handle)) {
        this.arena.release(handle);
      }
    }
  }

  private requireHead(operation: string): StepHandle {
    if (this.head === null) {
      throw new EmptyTimelineAccessError(operation);
    }
    return this.head;
  }

  private requireTail(): StepHandle {
    if (this.tail === null) {
      throw new TimelineError('non-empty timeline has no tail');
    }
    return this.tail;
  }

  private requireAnchor(): StepHandle {
    if (this.anchor === null) {
      throw new TimelineError('non-empty timeline has no anchor');
    }
    return this.anchor;
  }
}

function rearm(step: StepRecord<unknown>): void {
  step.counter = step.length;
}
