/**
 * Level simulator: runs a level file's actor timelines headlessly.
 *
 * Usage:
 *   level-sim --level <file.json> [--frames <n>] [--actor <id>] [--json]
 *             [--realtime] [--fps <n>] [--strict] [--verbose]
 *
 * Options:
 *   --level     Level file to load
 *   --frames    Number of simulation frames to run (default 60)
 *   --actor     Only trace this actor
 *   --json      Print one JSON document instead of text lines
 *   --realtime  Pace frames with the game loop instead of running flat out
 *   --fps       Simulation rate (default 30)
 *   --strict    Exit with status 1 when any actor failed to load
 *   --verbose   Print debug logging to stderr
 *   --help      Show this help message
 */

import { GameLoop, type GameLoopScheduler } from '@actor-timelines/engine';
import { createLevelSimulation, type BodySnapshot, type LevelSimulation } from '@actor-timelines/game-logic';
import { LevelFileError } from '@actor-timelines/level-data';

export interface LevelSimIo {
  readFile(path: string): string;
  stdout(line: string): void;
  stderr(line: string): void;
  /** Frame source for --realtime; the game loop's timer scheduler by default. */
  scheduler?: GameLoopScheduler;
}

interface CliArgs {
  level: string | undefined;
  frames: number;
  actor: string | undefined;
  json: boolean;
  realtime: boolean;
  fps: number;
  strict: boolean;
  verbose: boolean;
  help: boolean;
}

interface TraceEntry {
  frame: number;
  actorId: string;
  kind: string;
  param: number;
  remaining: number;
}

interface SimulationReport {
  levelIndex: number;
  frames: number;
  actors: string[];
  skipped: string[];
  trace: TraceEntry[];
  bodies: Record<string, BodySnapshot>;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const DEFAULT_FRAMES = 60;
const DEFAULT_FPS = 30;

// ============================================================================
// Argument parsing
// ============================================================================

function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    level: undefined,
    frames: DEFAULT_FRAMES,
    actor: undefined,
    json: false,
    realtime: false,
    fps: DEFAULT_FPS,
    strict: false,
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--level':
      case '-l':
        args.level = readArgValue(argv, ++i, '--level');
        break;
      case '--frames':
      case '-n':
        args.frames = readCount(argv, ++i, '--frames', 0);
        break;
      case '--actor':
      case '-a':
        args.actor = readArgValue(argv, ++i, '--actor');
        break;
      case '--json':
        args.json = true;
        break;
      case '--realtime':
        args.realtime = true;
        break;
      case '--fps':
        args.fps = readCount(argv, ++i, '--fps', 1);
        break;
      case '--strict':
        args.strict = true;
        break;
      case '--verbose':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${String(arg)}`);
    }
  }

  return args;
}

function readArgValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function readCount(argv: readonly string[], index: number, flag: string, minimum: number): number {
  const value = readArgValue(argv, index, flag);
  const count = Number(value);
  if (!Number.isInteger(count) || count < minimum) {
    const expected = minimum === 0 ? 'a non-negative integer' : 'a positive integer';
    throw new CliUsageError(`${flag} must be ${expected}, got ${value}`);
  }
  return count;
}

export function usage(): string {
  return `
Level simulator

Usage:
  level-sim --level <file.json> [--frames <n>] [--actor <id>] [--json]
            [--realtime] [--fps <n>] [--strict] [--verbose]

Options:
  --level,  -l   Level file to load (required)
  --frames, -n   Number of simulation frames to run (default ${DEFAULT_FRAMES})
  --actor,  -a   Only trace this actor
  --json         Print one JSON document instead of text lines
  --realtime     Pace frames with the game loop instead of running flat out
  --fps          Simulation rate (default ${DEFAULT_FPS})
  --strict       Exit with status 1 when any actor failed to load
  --verbose      Print debug logging to stderr
  --help,   -h   Show this help message
  `.trim();
}

// ============================================================================
// Running
// ============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function runFrames(simulation: LevelSimulation, args: CliArgs, io: LevelSimIo): Promise<void> {
  if (!args.realtime) {
    for (let frame = 0; frame < args.frames; frame++) {
      simulation.step(1 / args.fps);
    }
    return Promise.resolve();
  }

  if (args.frames === 0) {
    return Promise.resolve();
  }
  const loop = new GameLoop(args.fps, io.scheduler);
  return new Promise<void>((resolve) => {
    loop.start({
      onSimulationStep: (frame, dt) => {
        simulation.step(dt);
        if (frame + 1 >= args.frames) {
          loop.stop();
          resolve();
        }
      },
    });
  });
}

/** Run the simulator with `argv` in `process.argv` layout. Resolves to the exit code. */
export async function runLevelSim(argv: readonly string[], io: LevelSimIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) {
      throw error;
    }
    io.stderr(`Error: ${error.message}`);
    io.stdout(usage());
    return 1;
  }

  if (args.help) {
    io.stdout(usage());
    return 0;
  }
  if (!args.level) {
    io.stderr('Error: --level is required');
    io.stdout(usage());
    return 1;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(io.readFile(args.level));
  } catch (error) {
    io.stderr(`[ERROR] failed to read ${args.level}: ${errorMessage(error)}`);
    return 1;
  }

  let simulation: LevelSimulation;
  try {
    simulation = await createLevelSimulation(raw, {
      logger: {
        debug: (message) => {
          if (args.verbose) {
            io.stderr(message);
          }
        },
        warn: (message) => io.stderr(`[WARN] ${message}`),
      },
    });
  } catch (error) {
    if (!(error instanceof LevelFileError)) {
      throw error;
    }
    io.stderr(`[ERROR] ${error.message}`);
    return 1;
  }

  try {
    const actorFilter = args.actor;
    if (actorFilter !== undefined && !simulation.driver.has(actorFilter)) {
      io.stderr(`[ERROR] unknown actor "${actorFilter}"`);
      return 1;
    }

    const trace: TraceEntry[] = [];
    simulation.events.on('actor:step', ({ frame, actorId, step }) => {
      if (actorFilter !== undefined && actorId !== actorFilter) {
        return;
      }
      if (args.json) {
        trace.push({ frame, actorId, kind: step.kind, param: step.param, remaining: step.remaining });
      } else {
        io.stdout(`${frame} ${actorId} ${step.kind} remaining=${step.remaining}`);
      }
    });

    const actors = simulation.driver.actorIds();
    await runFrames(simulation, args, io);

    if (args.json) {
      const report: SimulationReport = {
        levelIndex: simulation.level.levelIndex,
        frames: args.frames,
        actors,
        skipped: simulation.errors.map((error) => error.message),
        trace,
        bodies: simulation.world.snapshot(),
      };
      io.stdout(JSON.stringify(report, null, 2));
    }

    return args.strict && simulation.errors.length > 0 ? 1 : 0;
  } finally {
    simulation.dispose();
  }
}
