/**
 * Fixed-timestep simulation loop.
 *
 * Timelines count in frames, not milliseconds, so the loop converts wall-clock
 * time into a whole number of simulation steps and hands each one to
 * `onSimulationStep`. The frame source is injectable: the default scheduler
 * runs on Node timers, tests drive a manual one.
 */

export interface GameLoopCallbacks {
  onSimulationStep(frameNumber: number, dt: number): void;
  /** Called once per scheduler tick with the leftover fraction of a step in [0,1). */
  onFrameEnd?(alpha: number): void;
}

export interface GameLoopScheduler {
  now(): number;
  requestFrame(callback: (timestamp: number) => void): number;
  cancelFrame(handle: number): void;
}

/** Longest wall-clock gap folded into a single tick. */
const MAX_ELAPSED_MS = 250;

export function createTimerScheduler(intervalMs = 1000 / 60): GameLoopScheduler {
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextHandle = 1;
  const now = (): number => performance.now();

  return {
    now,
    requestFrame(callback) {
      const handle = nextHandle;
      nextHandle += 1;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          callback(now());
        }, intervalMs),
      );
      return handle;
    },
    cancelFrame(handle) {
      const timer = timers.get(handle);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(handle);
      }
    },
  };
}

export class GameLoop {
  readonly simulationDt: number;

  private frameNumber = 0;
  private accumulator = 0;
  private lastTimestamp = 0;
  private running = false;
  private frameHandle = 0;
  private callbacks: GameLoopCallbacks | null = null;
  private readonly scheduler: GameLoopScheduler;

  speed = 1.0;
  paused = false;

  constructor(simulationFps = 30, scheduler?: GameLoopScheduler) {
    if (!Number.isFinite(simulationFps) || simulationFps <= 0) {
      throw new Error(`GameLoop requires a positive simulation rate, got ${simulationFps}`);
    }
    this.simulationDt = 1000 / simulationFps;
    this.scheduler = scheduler ?? createTimerScheduler();
  }

  start(callbacks: GameLoopCallbacks): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.callbacks = callbacks;
    this.lastTimestamp = this.scheduler.now();
    this.accumulator = 0;
    this.tick(this.lastTimestamp);
  }

  stop(): void {
    this.running = false;
    if (this.frameHandle !== 0) {
      this.scheduler.cancelFrame(this.frameHandle);
      this.frameHandle = 0;
    }
    this.callbacks = null;
  }

  reset(): void {
    this.frameNumber = 0;
    this.accumulator = 0;
    this.lastTimestamp = this.scheduler.now();
  }

  getFrameNumber(): number {
    return this.frameNumber;
  }

  isRunning(): boolean {
    return this.running;
  }

  private readonly tick = (timestamp: number): void => {
    if (!this.running) {
      return;
    }

    this.frameHandle = this.scheduler.requestFrame(this.tick);

    let elapsed = timestamp - this.lastTimestamp;
    this.lastTimestamp = timestamp;
    if (elapsed > MAX_ELAPSED_MS) {
      elapsed = MAX_ELAPSED_MS;
    }
    elapsed *= this.speed;

    if (!this.paused) {
      this.accumulator += elapsed;

      while (this.accumulator >= this.simulationDt) {
        // A step callback may stop the loop (e.g. a frame budget ran out).
        const callbacks = this.callbacks;
        if (!callbacks) {
          return;
        }
        callbacks.onSimulationStep(this.frameNumber, this.simulationDt / 1000);
        this.frameNumber += 1;
        this.accumulator -= this.simulationDt;
      }
    }

    this.callbacks?.onFrameEnd?.(this.accumulator / this.simulationDt);
  };
}
