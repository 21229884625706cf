/**
 * TimelineDriver: advances every bound actor's timeline once per frame.
 *
 * AI requests arriving on the event bus are queued and applied at the start of
 * the next update, so no timeline operation runs while another is in flight.
 */

import { EventBus, type Subsystem } from '@actor-timelines/engine';
import { LevelDataError } from '@actor-timelines/level-data';
import type { ResolvedStep, TimelineControl } from '@actor-timelines/timeline';

import type { ActorBinding } from './actor-binding.js';
import type { ActorAction } from './actor-catalogs.js';
import { UnknownActorError, UnsupportedActionError } from './errors.js';

export interface TimelineDriverConfig {
  /** What happens to an actor whose timeline has run out. */
  onTimelineExhausted: 'idle' | 'remove';
}

export const DEFAULT_TIMELINE_DRIVER_CONFIG: Readonly<TimelineDriverConfig> = {
  onTimelineExhausted: 'idle',
};

export interface TimelineDriverLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface ActorTimelineEvents {
  /** Request: splice name-based action records into an actor's timeline. */
  'actor:interrupt': { actorId: string; actions: unknown; fromBeginning: boolean };
  /** Request: drop any interruption and restart the actor's default pattern. */
  'actor:reset': { actorId: string };
  'actor:step': { frame: number; actorId: string; step: ResolvedStep<ActorAction> };
  'actor:step-completed': { frame: number; actorId: string; kind: ActorAction; param: number };
  'actor:retired': { frame: number; actorId: string };
}

export interface TimelineDriverOptions {
  events?: EventBus<ActorTimelineEvents>;
  config?: Partial<TimelineDriverConfig>;
  logger?: TimelineDriverLogger;
}

type DriverRequest =
  | { type: 'interrupt'; actorId: string; actions: unknown; fromBeginning: boolean }
  | { type: 'reset'; actorId: string };

export class TimelineDriver implements Subsystem {
  readonly name = 'timeline-driver';
  readonly events: EventBus<ActorTimelineEvents>;

  private readonly config: TimelineDriverConfig;
  private readonly logger: TimelineDriverLogger;
  private readonly bindings = new Map<string, ActorBinding>();
  private readonly exhausted = new Set<string>();
  /** Retired under the remove policy; kept so `reset()` can bring them back. */
  private readonly retired = new Set<string>();
  private readonly pending: DriverRequest[] = [];
  private unsubscribers: (() => void)[] = [];
  private frame = 0;

  constructor(options: TimelineDriverOptions = {}) {
    this.events = options.events ?? new EventBus<ActorTimelineEvents>();
    this.config = { ...DEFAULT_TIMELINE_DRIVER_CONFIG, ...options.config };
    this.logger = options.logger ?? console;
  }

  init(): void {
    this.unsubscribers = [
      this.events.on('actor:interrupt', ({ actorId, actions, fromBeginning }) => {
        this.pending.push({ type: 'interrupt', actorId, actions, fromBeginning });
      }),
      this.events.on('actor:reset', ({ actorId }) => {
        this.pending.push({ type: 'reset', actorId });
      }),
    ];
  }

  bind(binding: ActorBinding): void {
    if (this.bindings.has(binding.id)) {
      throw new Error(`Actor "${binding.id}" already bound`);
    }
    this.bindings.set(binding.id, binding);
  }

  unbind(actorId: string): void {
    const binding = this.bindings.get(actorId);
    if (!binding) {
      return;
    }
    binding.dispose();
    this.bindings.delete(actorId);
    this.exhausted.delete(actorId);
    this.retired.delete(actorId);
  }

  has(actorId: string): boolean {
    return this.active(actorId) !== undefined;
  }

  actorIds(): string[] {
    return [...this.bindings.keys()].filter((actorId) => !this.retired.has(actorId));
  }

  getBinding(actorId: string): ActorBinding {
    const binding = this.active(actorId);
    if (!binding) {
      throw new UnknownActorError(actorId);
    }
    return binding;
  }

  /** The timeline control an AI layer drives directly, between frames. */
  control(actorId: string): TimelineControl<ActorAction> {
    return this.getBinding(actorId).control();
  }

  getFrameNumber(): number {
    return this.frame;
  }

  update(_dt: number): void {
    this.applyPendingRequests();

    const retired: string[] = [];
    for (const binding of this.bindings.values()) {
      if (this.retired.has(binding.id)) {
        continue;
      }
      const step = binding.tick();
      if (step === null) {
        if (this.handleExhausted(binding)) {
          retired.push(binding.id);
        }
        continue;
      }

      this.exhausted.delete(binding.id);
      this.events.emit('actor:step', { frame: this.frame, actorId: binding.id, step });
      if (step.completed) {
        this.events.emit('actor:step-completed', {
          frame: this.frame,
          actorId: binding.id,
          kind: step.kind,
          param: step.param,
        });
      }
    }

    for (const actorId of retired) {
      this.getBinding(actorId).retire();
      this.retired.add(actorId);
      this.exhausted.delete(actorId);
      this.logger.debug(`[TimelineDriver frame=${this.frame}] retired "${actorId}"`);
      this.events.emit('actor:retired', { frame: this.frame, actorId });
    }

    this.frame += 1;
  }

  reset(): void {
    this.pending.length = 0;
    this.exhausted.clear();
    this.retired.clear();
    this.frame = 0;
    for (const binding of this.bindings.values()) {
      binding.restart();
    }
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    for (const binding of this.bindings.values()) {
      binding.dispose();
    }
    this.bindings.clear();
    this.exhausted.clear();
    this.retired.clear();
    this.pending.length = 0;
  }

  private active(actorId: string): ActorBinding | undefined {
    return this.retired.has(actorId) ? undefined : this.bindings.get(actorId);
  }

  /** Returns true when the actor should be retired. */
  private handleExhausted(binding: ActorBinding): boolean {
    if (this.config.onTimelineExhausted === 'remove') {
      return true;
    }
    binding.halt();
    if (!this.exhausted.has(binding.id)) {
      this.exhausted.add(binding.id);
      this.logger.debug(`[TimelineDriver frame=${this.frame}] "${binding.id}" idle, timeline exhausted`);
    }
    return false;
  }

  private applyPendingRequests(): void {
    const requests = this.pending.splice(0);
    for (const request of requests) {
      const binding = this.active(request.actorId);
      if (!binding) {
        this.logger.warn(
          `[TimelineDriver frame=${this.frame}] dropped ${request.type} for unknown actor "${request.actorId}"`,
        );
        continue;
      }

      if (request.type === 'reset') {
        binding.resetTimeline();
        continue;
      }

      try {
        binding.forceActions(request.actions, request.fromBeginning);
      } catch (error) {
        if (!(error instanceof LevelDataError) && !(error instanceof UnsupportedActionError)) {
          throw error;
        }
        this.logger.warn(
          `[TimelineDriver frame=${this.frame}] rejected interrupt for "${request.actorId}": ${error.message}`,
        );
      }
    }
  }
}
