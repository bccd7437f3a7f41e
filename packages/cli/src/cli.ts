/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Selection mode help text
 */
const MODES_HELP = `
Selection modes (choose one):
  mate      --mate <n> | --mate-mix <list> | --mate-up-to <n>
  tactical  --themes <list> and/or --ply <list>
  mixed     --mix-ratio <tactical:mate> with a mate and a tactical option

Examples:
  $ matebook generate --mate 2 -n 30
  $ matebook generate --mate-up-to 3 --progressive --seed 7
  $ matebook generate --themes fork,pin --ply 3 --min-rating 1200
  $ matebook generate --mate 1 --themes fork --mix-ratio 70:30`;

/**
 * Parse an integer option value
 */
export function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return Number(value);
}

/**
 * Parse a numeric option value
 */
export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('matebook')
    .description('Build verified chess puzzle books (LaTeX) from a puzzle corpus')
    .version(VERSION);

  program
    .command('generate')
    .description('Select, verify and typeset puzzles')
    .option('-n, --number <n>', 'Number of puzzles (default: 20)', parseIntegerOption)
    .option('-m, --mate <n>', 'Mate-in-N puzzles', parseIntegerOption)
    .option('--mate-mix <list>', 'Mix of mate lengths, e.g. 1,2,3')
    .option('--mate-up-to <n>', 'Mates in 1 to N moves', parseIntegerOption)
    .option('--themes <list>', 'Tactical themes, e.g. fork,pin')
    .option('--ply <list>', 'Allowed solution lengths in plies, e.g. 3,5')
    .option('--mix-ratio <tactical:mate>', 'Tactical to mate ratio, e.g. 70:30')
    .option('--min-rating <n>', 'Minimum puzzle rating', parseIntegerOption)
    .option('--max-rating <n>', 'Maximum puzzle rating', parseIntegerOption)
    .option('-p, --progressive', 'Order puzzles from easiest to hardest')
    .option('--hide-ratings', 'Leave ratings out of the document')
    .option('--show-mate-count', 'State the mate length in every prompt')
    .option('-o, --output <file>', 'Output LaTeX file (default: chess_puzzles.tex)')
    .option('-t, --title <title>', 'Document title')
    .option('-f, --file <csv>', 'Puzzle corpus CSV file')
    .option(
      '--oversample <factor>',
      'Records read per requested puzzle (default: 3)',
      parseNumberOption,
    )
    .option('--seed <n>', 'Seed for reproducible selection', parseIntegerOption)
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--preview', 'Print a text diagram of every selected puzzle')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('-q, --quiet', 'Only print errors')
    .addHelpText('after', MODES_HELP)
    .action(async (options: Record<string, unknown>) => {
      // Import lazily so --help does not load the board engine
      const { generateCommand } = await import('./commands/generate.js');
      await generateCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

const STRING_OPTIONS = [
  'mateMix',
  'themes',
  'ply',
  'mixRatio',
  'output',
  'title',
  'file',
  'config',
] as const satisfies ReadonlyArray<keyof CliOptions>;

const NUMBER_OPTIONS = [
  'number',
  'mate',
  'mateUpTo',
  'minRating',
  'maxRating',
  'oversample',
  'seed',
] as const satisfies ReadonlyArray<keyof CliOptions>;

const BOOLEAN_OPTIONS = [
  'progressive',
  'hideRatings',
  'showMateCount',
  'showConfig',
  'preview',
  'quiet',
] as const satisfies ReadonlyArray<keyof CliOptions>;

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  for (const key of STRING_OPTIONS) {
    const value = stringOption(options, key);
    if (value !== undefined) result[key] = value;
  }
  for (const key of NUMBER_OPTIONS) {
    const value = numberOption(options, key);
    if (value !== undefined) result[key] = value;
  }
  for (const key of BOOLEAN_OPTIONS) {
    const value = booleanOption(options, key);
    if (value !== undefined) result[key] = value;
  }
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
