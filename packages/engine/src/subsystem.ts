/**
 * Subsystem interface and lifecycle registry.
 *
 * Everything that runs once per simulation frame (the timeline driver, the
 * kinematic world) registers here so the simulation can be initialized,
 * stepped, reset and torn down in one consistent order.
 */

export interface Subsystem {
  /** Unique subsystem name. */
  readonly name: string;
  /** Initialize subsystem resources. */
  init(): Promise<void> | void;
  /** Optional post-load hook, run once every subsystem has been initialized. */
  postProcessLoad?(): Promise<void> | void;
  /** Per-frame update step. */
  update(dt: number): void;
  /** Reset transient state for a fresh run of the same level. */
  reset(): void;
  /** Release resources. */
  dispose(): void;
}

export class SubsystemRegistry {
  private readonly subsystems = new Map<string, Subsystem>();
  private readonly updateOrder: Subsystem[] = [];

  register(subsystem: Subsystem): void {
    if (this.subsystems.has(subsystem.name)) {
      throw new Error(`Subsystem "${subsystem.name}" already registered`);
    }
    this.subsystems.set(subsystem.name, subsystem);
    this.updateOrder.push(subsystem);
  }

  get(name: string): Subsystem {
    const subsystem = this.subsystems.get(name);
    if (!subsystem) {
      throw new Error(`Subsystem "${name}" not found`);
    }
    return subsystem;
  }

  has(name: string): boolean {
    return this.subsystems.has(name);
  }

  names(): string[] {
    return this.updateOrder.map((subsystem) => subsystem.name);
  }

  async initAll(): Promise<void> {
    for (const subsystem of this.updateOrder) {
      await subsystem.init();
    }
  }

  async postProcessLoadAll(): Promise<void> {
    for (const subsystem of this.updateOrder) {
      if (typeof subsystem.postProcessLoad === 'function') {
        await subsystem.postProcessLoad();
      }
    }
  }

  updateAll(dt: number): void {
    for (const subsystem of this.updateOrder) {
      subsystem.update(dt);
    }
  }

  resetAll(): void {
    // Later subsystems consume state from earlier ones, so unwind in reverse.
    for (let index = this.updateOrder.length - 1; index >= 0; index -= 1) {
      const subsystem = this.updateOrder[index];
      if (subsystem) {
        subsystem.reset();
      }
    }
  }

  disposeAll(): void {
    for (let index = this.updateOrder.length - 1; index >= 0; index -= 1) {
      const subsystem = this.updateOrder[index];
      if (subsystem) {
        subsystem.dispose();
      }
    }
    this.subsystems.clear();
    this.updateOrder.length = 0;
  }
}
