/**
 * Typed error classes for actor simulation.
 */

/** An actor was handed a step its type has no behavior for. */
export class UnsupportedActionError extends Error {
  constructor(
    public readonly actorType: string,
    public readonly kind: string,
  ) {
    super(`Actor type "${actorType}" has no "${kind}" action`);
    this.name = 'UnsupportedActionError';
  }
}

/** An actor id did not match any bound actor. */
export class UnknownActorError extends Error {
  constructor(public readonly actorId: string) {
    super(`Unknown actor "${actorId}"`);
    this.name = 'UnknownActorError';
  }
}
