/**
 * Weasel command line
 *
 * Parses options, validates them, then prints one line per generation.
 * Exit code 0 on convergence, 1 on any error.
 */

import { validateConfig, type WeaselOptions } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import { formatGeneration, Orchestrator } from './orchestrator.js';
import { DEFAULT_CONFIG } from './types.js';

export const VERSION = '1.0.0';

export const HELP = `
Weasel v${VERSION}

Evolve a random string into a target phrase by mutation and selection.

Usage:
  weasel --phrase <text> [options]

Options:
  -p, --phrase <text>         Phrase to evolve towards (required)
  -c, --char-set <chars>      Approved character set (default: "${DEFAULT_CONFIG.charSet}")
  -i, --iterations <n>        Variations per generation, >= 1 (default: ${DEFAULT_CONFIG.iterations})
  -m, --mutation-rate <n>     Mutation rate per character, 1-100 (default: ${DEFAULT_CONFIG.mutationRate})
  -s, --seed <text>           Seed the random source for a reproducible run
      --verbose               Print diagnostics to standard error
  -h, --help                  Show this help
  -V, --version               Show version

Examples:
  weasel -p "Hello!" -m 10
  weasel --phrase GO --char-set GO --iterations 50 --mutation-rate 100
`;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: WeaselOptions; verbose: boolean };

type ValueOption = 'phrase' | 'charSet' | 'iterations' | 'mutationRate' | 'seed';

const VALUE_OPTIONS = new Map<string, ValueOption>([
  ['--phrase', 'phrase'],
  ['-p', 'phrase'],
  ['--char-set', 'charSet'],
  ['-c', 'charSet'],
  ['--iterations', 'iterations'],
  ['-i', 'iterations'],
  ['--mutation-rate', 'mutationRate'],
  ['-m', 'mutationRate'],
  ['--seed', 'seed'],
  ['-s', 'seed'],
]);

function parseInteger(flag: string, raw: string): number {
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`Invalid value '${raw}' for ${flag}: expected an integer`, flag);
  }
  return Number(raw);
}

/**
 * Turn argv (without node and script) into a command
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const options: WeaselOptions = {};
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (arg === '--version' || arg === '-V') {
      return { kind: 'version' };
    }
    if (arg === '--verbose') {
      verbose = true;
      continue;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_OPTIONS.get(flag);

    if (key === undefined) {
      throw new ConfigurationError(`Unknown option '${arg}'`, arg);
    }

    let raw: string;
    if (eq !== -1) {
      raw = arg.slice(eq + 1);
    } else if (i + 1 < argv.length) {
      raw = argv[i + 1];
      i++;
    } else {
      throw new ConfigurationError(`Missing value for ${flag}`, flag);
    }

    switch (key) {
      case 'iterations':
      case 'mutationRate':
        options[key] = parseInteger(flag, raw);
        break;
      default:
        options[key] = raw;
    }
  }

  return { kind: 'run', options, verbose };
}

/**
 * Run the CLI and return the process exit code
 */
export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
  try {
    const command = parseCliArgs(argv);

    if (command.kind === 'help') {
      io.stdout(HELP);
      return 0;
    }
    if (command.kind === 'version') {
      io.stdout(VERSION);
      return 0;
    }

    const validated = validateConfig(command.options);
    if (!validated.ok) {
      io.stderr(`Error: ${validated.error.message}`);
      return 1;
    }

    const orchestrator = new Orchestrator(validated.config, {
      onProgress: (result) => io.stdout(formatGeneration(result)),
      log: command.verbose ? io.stderr : undefined,
    });
    orchestrator.evolve();
    return 0;
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}`);
    return 1;
  }
}

/**
 * Record the exit code and let the process end once output has drained
 */
export function runMain(
  argv: readonly string[],
  target: { exitCode?: number | string | null } = process,
  io: CliIO = consoleIO
): void {
  target.exitCode = runCli(argv, io);
}
