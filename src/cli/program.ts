/**
 * `hash-puzzle` command: prints one puzzle as a JSON document.
 *
 * Parameter parsing and defaulting live here; the puzzle generator only
 * receives a technique and a difficulty.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  DEFAULT_DIFFICULTY,
  DEFAULT_TECHNIQUE,
  PuzzleGenerator,
  createSeededRandom,
  summarizePuzzle,
  toPuzzleDocument,
} from '../puzzle-generator';

export interface CliIO {
  /** Receives the JSON document */
  stdout: (text: string) => void;

  /** Receives diagnostics and stats */
  stderr: (text: string) => void;
}

interface PuzzleOptions {
  technique: string;
  difficulty: string;
  seed?: number;
  pretty: boolean;
  stats: boolean;
}

const defaultIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function parseSeed(value: string): number {
  const seed = Number(value);
  if (!Number.isInteger(seed)) {
    throw new InvalidArgumentError('Seed must be an integer.');
  }
  return seed;
}

/**
 * Build the command. Output goes through io; errors from the generator
 * propagate out of parse().
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('hash-puzzle')
    .description('Generate a hash table collision puzzle')
    .version('1.0.0')
    .option(
      '-t, --technique <name>',
      'linear_probing|quadratic_probing|double_hashing|chaining',
      DEFAULT_TECHNIQUE
    )
    .option('-d, --difficulty <tier>', 'easy|medium|hard', DEFAULT_DIFFICULTY)
    .option('--seed <number>', 'Deterministic seed', parseSeed)
    .option('--pretty', 'Indent the JSON output', false)
    .option('--stats', 'Print puzzle statistics as JSON to stderr', false)
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .exitOverride()
    .action((options: PuzzleOptions) => {
      const random = options.seed === undefined ? Math.random : createSeededRandom(options.seed);
      const generator = new PuzzleGenerator({ random });
      const puzzle = generator.generatePuzzle(options.technique, options.difficulty);

      io.stdout(JSON.stringify(toPuzzleDocument(puzzle), null, options.pretty ? 2 : undefined));
      if (options.stats) {
        io.stderr(JSON.stringify(summarizePuzzle(puzzle)));
      }
    });

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and run.
 *
 * @returns Exit code
 */
export function runCli(args: string[], io: CliIO = defaultIO): number {
  const program = createProgram(io);
  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    // exitOverride() turns commander's own exits (help, version, bad option) into throws
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof Error) {
      io.stderr(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  return 0;
}
