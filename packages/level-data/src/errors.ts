/**
 * Typed error classes for level loading.
 */

/** The level document itself is unusable; nothing can be loaded from it. */
export class LevelFileError extends Error {
  constructor(
    public readonly field: string,
    detail: string,
  ) {
    super(`Level ${field}: ${detail}`);
    this.name = 'LevelFileError';
  }
}

/**
 * One actor's data is unusable. Only that actor is skipped; the rest of the
 * level still loads.
 */
export class LevelDataError extends Error {
  constructor(
    public readonly actorIndex: number,
    public readonly field: string,
    public readonly detail: string,
    public readonly recordIndex?: number,
  ) {
    const where = recordIndex === undefined ? `actor ${actorIndex}` : `actor ${actorIndex} action ${recordIndex}`;
    super(`Invalid ${where} ${field}: ${detail}`);
    this.name = 'LevelDataError';
  }
}
