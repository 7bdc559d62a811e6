/**
 * nex-run: load a scene file and run it until interrupted.
 *
 * Usage:
 *   nex-run [file.nex] [--interval <ms>] [--pacing <policy>] [--assets <dir>]
 *           [--continue-on-error] [--verbose]
 *
 * Options:
 *   --interval           Wait between ticks in milliseconds (default 16)
 *   --pacing             fixed-sleep (default) or fixed-rate
 *   --assets             Resolve imports as files under <dir>
 *   --continue-on-error  Log failing ticks and keep running
 *   --verbose            Print per-tick debug output
 *   --help               Show this help message
 */

import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describeError, type NexLogger } from '@nex/core';
import type { FrameClock, FramePacing } from '@nex/engine';
import type { RenderSink } from '@nex/renderer';

import { NexRuntime } from './runtime.js';
import type { RuntimeConfig } from './runtime-config.js';

const CLI_DIR = dirname(fileURLToPath(import.meta.url));

/** Scene run when no file is given. */
export const DEMO_SCENE_PATH = resolve(CLI_DIR, '../scenes/space-battle.nex');

export interface RunArgs {
  file: string;
  verbose: boolean;
  config: Partial<RuntimeConfig>;
}

export type ParsedRunArgs =
  | { kind: 'run'; args: RunArgs }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const RUN_USAGE = `
nex-run: run a Nex scene

Usage:
  nex-run [file.nex] [--interval <ms>] [--pacing <policy>] [--assets <dir>] [--continue-on-error] [--verbose]

Options:
  --interval, -i   Wait between ticks in milliseconds (default 16)
  --pacing         fixed-sleep (default) or fixed-rate
  --assets         Resolve imports as files under <dir>
  --continue-on-error
                   Log failing ticks and keep running
  --verbose,  -v   Print per-tick debug output
  --help,     -h   Show this help message
`.trim();

/** Parse arguments after the program name. */
export function parseRunArgs(argv: readonly string[]): ParsedRunArgs {
  const config: Partial<RuntimeConfig> = {};
  let file: string | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--interval':
      case '-i': {
        const value = argv[++i];
        const interval = value === undefined ? Number.NaN : Number(value);
        if (!Number.isFinite(interval) || interval <= 0) {
          return { kind: 'error', message: '--interval requires a positive number of milliseconds' };
        }
        config.frameIntervalMs = interval;
        break;
      }
      case '--pacing': {
        const value = argv[++i];
        if (!isFramePacing(value)) {
          return { kind: 'error', message: '--pacing must be fixed-sleep or fixed-rate' };
        }
        config.pacing = value;
        break;
      }
      case '--assets': {
        const value = argv[++i];
        if (!value) {
          return { kind: 'error', message: '--assets requires a value' };
        }
        config.assetBackend = 'file';
        config.assetBaseDir = value;
        break;
      }
      case '--continue-on-error':
        config.tickErrorPolicy = 'log-and-continue';
        break;
      case '--verbose':
      case '-v':
        verbose = true;
        break;
      case '--help':
      case '-h':
        return { kind: 'help' };
      default:
        if (arg === undefined || arg.startsWith('-')) {
          return { kind: 'error', message: `Unknown argument: ${arg}` };
        }
        if (file !== undefined) {
          return { kind: 'error', message: `Unexpected extra file: ${arg}` };
        }
        file = arg;
    }
  }

  return { kind: 'run', args: { file: file ?? DEMO_SCENE_PATH, verbose, config } };
}

function isFramePacing(value: string | undefined): value is FramePacing {
  return value === 'fixed-sleep' || value === 'fixed-rate';
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Abort `controller` on SIGINT or SIGTERM. The listeners stay attached, so a
 * repeated signal during teardown lands on the already aborted controller
 * instead of the default handler.
 */
export function abortOnInterrupt(source: SignalSource, controller: AbortController): void {
  const abort = (): void => controller.abort();
  source.on('SIGINT', abort);
  source.on('SIGTERM', abort);
}

export interface RunCliOptions {
  /** Builds the runtime logger once `--verbose` is known. */
  createLogger: (verbose: boolean) => NexLogger;
  /** Prints usage and argument errors. Default: console.log. */
  print?: (text: string) => void;
  signal?: AbortSignal;
  clock?: FrameClock;
  renderSink?: RenderSink;
}

/**
 * Run the CLI and return its exit code: 0 after an interrupt, 1 when the
 * arguments are wrong, the scene fails to load or the loop fails.
 */
export async function runNexCli(argv: readonly string[], options: RunCliOptions): Promise<number> {
  const print = options.print ?? ((text: string) => console.log(text));

  const parsed = parseRunArgs(argv);
  if (parsed.kind === 'help') {
    print(RUN_USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    print(`Error: ${parsed.message}`);
    print(RUN_USAGE);
    return 1;
  }

  const logger = options.createLogger(parsed.args.verbose);
  let runtime: NexRuntime;
  try {
    runtime = new NexRuntime({
      config: parsed.args.config,
      logger,
      clock: options.clock,
      renderSink: options.renderSink,
    });
  } catch (error) {
    logger.error(`[nex-run] ${describeError(error)}`);
    return 1;
  }

  if (!(await runtime.loadFile(parsed.args.file))) {
    return 1;
  }

  try {
    await runtime.run(options.signal);
  } catch (error) {
    logger.error(`[nex-run] ${describeError(error)}`);
    return 1;
  }
  return 0;
}
