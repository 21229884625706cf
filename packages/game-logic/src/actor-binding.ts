/**
 * ActorBinding: one actor's live timeline, its body and its catalog.
 *
 * The binding keeps the authored timeline as a template and runs a clone of
 * it, so restarting the level never has to rebuild from level data.
 */

import type { ActorType } from '@actor-timelines/level-data';
import { buildActorTimeline, validateActionRecords } from '@actor-timelines/level-data';
import {
  Timeline,
  type ResolvedStep,
  type StepSpec,
  type TimelineControl,
  type TimelineState,
} from '@actor-timelines/timeline';

import type { ActorAction, ActorCatalog, ActorMotionConfig } from './actor-catalogs.js';
import { UnsupportedActionError } from './errors.js';
import type { KinematicBody, MovableBody } from './kinematic-body.js';

export interface ActorBindingOptions {
  id: string;
  /** Position of the actor in its level file, for error reports. */
  index: number;
  catalog: ActorCatalog;
  /** Authored timeline. The binding takes ownership. */
  template: Timeline<ActorAction>;
  body: MovableBody;
  shadow?: KinematicBody | null;
  motion: ActorMotionConfig;
}

export class ActorBinding {
  readonly id: string;
  readonly index: number;
  readonly catalog: ActorCatalog;
  readonly body: MovableBody;
  readonly shadow: KinematicBody | null;

  private readonly template: Timeline<ActorAction>;
  private readonly motion: ActorMotionConfig;
  private timeline: Timeline<ActorAction>;

  constructor(options: ActorBindingOptions) {
    this.id = options.id;
    this.index = options.index;
    this.catalog = options.catalog;
    this.template = options.template;
    this.body = options.body;
    this.shadow = options.shadow ?? null;
    this.motion = options.motion;
    this.timeline = this.template.clone();
  }

  get type(): ActorType {
    return this.catalog.type;
  }

  isEmpty(): boolean {
    return this.timeline.isEmpty();
  }

  state(): TimelineState {
    return this.timeline.state();
  }

  /** Run one frame and apply it to the body. Returns null once the timeline is exhausted. */
  tick(): ResolvedStep<ActorAction> | null {
    if (this.timeline.isEmpty()) {
      return null;
    }
    const step = this.timeline.advance();
    this.catalog.apply(this.body, step, this.motion);
    this.shadow?.mirror(this.body);
    return step;
  }

  /** Stop moving; used while the actor idles on an exhausted timeline. */
  halt(): void {
    this.body.velocity.set(0, 0);
    this.shadow?.mirror(this.body);
  }

  /** Validate name-based action records against this actor's catalog and force them. */
  forceActions(raw: unknown, fromBeginning: boolean): void {
    const records = validateActionRecords(raw, this.index);
    const interrupt = buildActorTimeline(records, (name) => this.catalog.resolve(name), {
      arena: this.timeline.arena,
      actorIndex: this.index,
    });
    this.timeline.force(interrupt, fromBeginning);
  }

  resetTimeline(): void {
    this.timeline.reset();
  }

  /** Drop the live timeline and stop. The template stays for `restart()`. */
  retire(): void {
    this.timeline.dispose();
    this.halt();
  }

  /** Replace the live timeline with a fresh clone of the template. */
  restart(): void {
    this.timeline.dispose();
    this.timeline = this.template.clone();
  }

  /** AI-facing control that refuses steps this actor type cannot perform. */
  control(): TimelineControl<ActorAction> {
    return {
      advance: () => this.timeline.advance(),
      force: (interrupt, fromBeginning) => {
        const specs: readonly StepSpec<ActorAction>[] =
          interrupt instanceof Timeline ? interrupt.steps() : interrupt;
        for (const spec of specs) {
          if (!this.catalog.supports(spec.kind)) {
            throw new UnsupportedActionError(this.catalog.type, spec.kind);
          }
        }
        this.timeline.force(interrupt, fromBeginning);
      },
      reset: () => this.timeline.reset(),
      isEmpty: () => this.timeline.isEmpty(),
    };
  }

  dispose(): void {
    this.timeline.dispose();
    this.template.dispose();
  }
}
