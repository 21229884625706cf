import { describe, expect, it } from 'vitest';

import type { Subsystem } from './subsystem.js';
import { SubsystemRegistry } from './subsystem.js';

class TestSubsystem implements Subsystem {
  readonly name: string;
  private readonly log: string[];

  constructor(name: string, log: string[]) {
    this.name = name;
    this.log = log;
  }

  init(): void {
    this.log.push(`init:${this.name}`);
  }

  postProcessLoad(): void {
    this.log.push(`post:${this.name}`);
  }

  update(_dt: number): void {
    this.log.push(`update:${this.name}`);
  }

  reset(): void {
    this.log.push(`reset:${this.name}`);
  }

  dispose(): void {
    this.log.push(`dispose:${this.name}`);
  }
}

describe('SubsystemRegistry', () => {
  it('runs lifecycle hooks in order and unwinds reset/dispose in reverse', async () => {
    const log: string[] = [];
    const registry = new SubsystemRegistry();

    registry.register(new TestSubsystem('A', log));
    registry.register(new TestSubsystem('B', log));
    registry.register(new TestSubsystem('C', log));

    await registry.initAll();
    await registry.postProcessLoadAll();
    registry.updateAll(1 / 30);
    registry.resetAll();
    registry.disposeAll();

    expect(log).toEqual([
      'init:A',
      'init:B',
      'init:C',
      'post:A',
      'post:B',
      'post:C',
      'update:A',
      'update:B',
      'update:C',
      'reset:C',
      'reset:B',
      'reset:A',
      'dispose:C',
      'dispose:B',
      'dispose:A',
    ]);
    expect(registry.names()).toEqual([]);
  });

  it('rejects duplicate registrations', () => {
    const registry = new SubsystemRegistry();
    const subsystem = new TestSubsystem('Duplicate', []);

    registry.register(subsystem);
    expect(() => registry.register(subsystem)).toThrow('already registered');
  });

  it('looks subsystems up by name', () => {
    const registry = new SubsystemRegistry();
    const plain = new TestSubsystem('plain', []);
    registry.register(plain);

    expect(registry.get('plain')).toBe(plain);
    expect(registry.has('missing')).toBe(false);
    expect(() => registry.get('missing')).toThrow('Subsystem "missing" not found');
  });
});
