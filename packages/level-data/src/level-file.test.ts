import { describe, expect, it } from 'vitest';

import { LevelFileError } from './errors.js';
import { parseLevelFile } from './level-file.js';

describe('parseLevelFile', () => {
  it('fills actor defaults', () => {
    const { level, errors } = parseLevelFile({
      actors: [{ type: 'pedestrian', actions: [{ kind: 'stand', length: 2 }] }],
    });

    expect(errors).toEqual([]);
    expect(level).toEqual({
      levelIndex: 0,
      actors: [
        {
          id: 'pedestrian-0',
          type: 'pedestrian',
          position: { x: 0, y: 0 },
          heading: 0,
          actions: [{ kind: 'stand', length: 2 }],
          index: 0,
        },
      ],
    });
  });

  it('skips bad actors and keeps loading the rest', () => {
    const { level, errors } = parseLevelFile({
      levelIndex: 2,
      actors: [
        { type: 'pedestrian', actions: [] },
        { type: 'tank', actions: [] },
        { id: 'pedestrian-0', type: 'car', actions: [] },
        { type: 'caster', actions: [{ kind: 'go', length: -1 }] },
        {
          id: 'car-a',
          type: 'car',
          position: { x: 1, y: 2 },
          heading: 1.5,
          actions: [{ kind: 'go', length: 3, cyclic: true }],
        },
      ],
    });

    expect(level.levelIndex).toBe(2);
    expect(level.actors.map((actor) => actor.id)).toEqual(['pedestrian-0', 'car-a']);
    expect(level.actors[1]?.position).toEqual({ x: 1, y: 2 });
    expect(errors.map((error) => [error.actorIndex, error.field, error.recordIndex])).toEqual([
      [1, 'type', undefined],
      [2, 'id', undefined],
      [3, 'length', 0],
    ]);
    expect(errors[1]?.message).toBe('Invalid actor 2 id: duplicate actor id "pedestrian-0"');
  });

  it('rejects a bad position', () => {
    const { errors } = parseLevelFile({
      actors: [{ type: 'car', position: { x: 1 }, actions: [] }],
    });
    expect(errors[0]?.message).toBe('Invalid actor 0 position: must be an object with finite x and y');
  });

  it('throws on an unusable document', () => {
    expect(() => parseLevelFile([])).toThrow(LevelFileError);
    expect(() => parseLevelFile({ actors: {} })).toThrow('Level actors: must be an array');
    expect(() => parseLevelFile({ levelIndex: -1, actors: [] })).toThrow(
      'Level levelIndex: must be a non-negative integer, got -1',
    );
  });
});
