/**
 * Turns generate options into a selection plan: which groups to fill, how to
 * prefilter the corpus and how much of it to read.
 */

import {
  allTacticalThemes,
  InvalidConstraintError,
  parseMixRatio,
  parsePositiveIntList,
  validateThemes,
  type PuzzleSetRequest,
  type SelectionGroup,
} from '@matebook/core';
import type { CorpusFilter } from '@matebook/database';
import {
  allOf,
  mateInExactly,
  oneOf,
  plyCountIn,
  themeIn,
  type Criterion,
} from '@matebook/types';

import type { CliOptions, MatebookConfig } from '../config/schema.js';
import { ConfigError } from '../errors/cli-errors.js';

export type SelectionMode = 'mate' | 'tactical' | 'mixed';

/**
 * How the mate depths were asked for; decides the default title
 */
type MateSource = 'mate' | 'mateMix' | 'mateUpTo';

interface MatePart {
  source: MateSource;
  depths: number[];
}

interface TacticalPart {
  themes: string[];
  plies: number[];
}

export interface SelectionPlan {
  mode: SelectionMode;
  title: string;
  /** Short description for progress output, e.g. "mate-in-2 puzzles" */
  description: string;
  request: PuzzleSetRequest;
  corpusFilter: CorpusFilter;
  /** Matching records to read before stopping */
  readLimit: number;
  /** Set only when the user asked to state mate lengths */
  showMateCount?: boolean;
}

const MATE_OPTIONS = '--mate, --mate-mix and --mate-up-to';

/**
 * Run a constraint parser, reporting its failure as a ConfigError
 */
function parseOption<T>(parse: () => T, suggestion?: string): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof InvalidConstraintError) {
      throw new ConfigError(error.message, suggestion);
    }
    throw error;
  }
}

function requirePositive(value: number, flag: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${flag} must be a positive integer, got ${value}`);
  }
  return value;
}

function resolveMatePart(options: CliOptions): MatePart | null {
  const given: MatePart[] = [];

  if (options.mate !== undefined) {
    given.push({ source: 'mate', depths: [requirePositive(options.mate, '--mate')] });
  }
  if (options.mateMix !== undefined) {
    const list = options.mateMix;
    given.push({
      source: 'mateMix',
      depths: parseOption(() => parsePositiveIntList(list), 'Use a list such as --mate-mix 1,2,3'),
    });
  }
  if (options.mateUpTo !== undefined) {
    const upTo = requirePositive(options.mateUpTo, '--mate-up-to');
    given.push({
      source: 'mateUpTo',
      depths: Array.from({ length: upTo }, (_, i) => i + 1),
    });
  }

  if (given.length > 1) {
    throw new ConfigError(`Use only one of ${MATE_OPTIONS}`);
  }
  return given[0] ?? null;
}

function resolveTacticalPart(options: CliOptions): TacticalPart | null {
  if (options.themes === undefined && options.ply === undefined) {
    return null;
  }

  const { themes, ply } = options;
  return {
    themes:
      themes !== undefined
        ? parseOption(
            () => validateThemes(themes),
            `Available themes: ${allTacticalThemes().join(', ')}`,
          )
        : [],
    plies:
      ply !== undefined
        ? parseOption(() => parsePositiveIntList(ply), 'Use a list such as --ply 3,5')
        : [],
  };
}

function mateCriterion(part: MatePart): Criterion {
  const criteria = part.depths.map(mateInExactly);
  const [only] = criteria;
  return criteria.length === 1 && only ? only : oneOf(criteria);
}

function tacticalCriterion(part: TacticalPart): Criterion {
  const criteria: Criterion[] = [];
  if (part.themes.length > 0) {
    criteria.push(themeIn(part.themes));
  }
  if (part.plies.length > 0) {
    criteria.push(plyCountIn(part.plies));
  }
  const [only] = criteria;
  return criteria.length === 1 && only ? only : allOf(criteria);
}

function mateTitle(part: MatePart): string {
  switch (part.source) {
    case 'mate':
      return `Mate-in-${part.depths.join('/')} Chess Puzzles`;
    case 'mateMix':
      return 'Mixed Mate Chess Puzzles';
    case 'mateUpTo':
      return `Chess Puzzles (Mate in 1-${part.depths.length} moves)`;
  }
}

function mateDescription(part: MatePart): string {
  return `mate-in-${part.depths.join('/')} puzzles`;
}

function tacticalDescription(part: TacticalPart): string {
  const details: string[] = [];
  if (part.themes.length > 0) {
    details.push(part.themes.join(', '));
  }
  if (part.plies.length > 0) {
    details.push(`${part.plies.join('/')} plies`);
  }
  return `tactical puzzles (${details.join('; ')})`;
}

function mateTags(part: MatePart): string[] {
  return part.depths.map((depth) => `mateIn${depth}`);
}

/**
 * Build the plan for a generate run
 * @throws ConfigError on a missing, conflicting or malformed selection option
 */
export function buildSelectionPlan(options: CliOptions, config: MatebookConfig): SelectionPlan {
  const mate = resolveMatePart(options);
  const tactical = resolveTacticalPart(options);
  const count = config.selection.count;

  let mode: SelectionMode;
  let groups: SelectionGroup[];
  let title: string;
  let description: string;
  const corpusFilter: {
    minRating?: number;
    maxRating?: number;
    anyTags?: string[];
    requiredTags?: string[];
    plyCounts?: number[];
  } = {};

  if (options.mixRatio !== undefined) {
    const mixRatio = options.mixRatio;
    if (!mate || !tactical) {
      throw new ConfigError(
        '--mix-ratio needs both a mate option and a tactical option',
        `Combine one of ${MATE_OPTIONS} with --themes or --ply`,
      );
    }
    const ratio = parseOption(() => parseMixRatio(mixRatio), 'Use tactical:mate, e.g. 70:30');

    mode = 'mixed';
    // Mates go first so a verified mate is never counted as tactical
    groups = [
      { label: 'mate', percentage: ratio.mate, criterion: mateCriterion(mate) },
      { label: 'tactical', percentage: ratio.tactical, criterion: tacticalCriterion(tactical) },
    ];
    title = 'Mixed Chess Puzzles';
    description = `${mateDescription(mate)} and ${tacticalDescription(tactical)} (${ratio.tactical}:${ratio.mate})`;
    // A ply-only tactical group can match any tag
    if (tactical.themes.length > 0) {
      corpusFilter.anyTags = [...mateTags(mate), ...tactical.themes];
    }
  } else if (mate && tactical) {
    throw new ConfigError(
      'Mate and tactical options cannot be combined without --mix-ratio',
      'Add --mix-ratio tactical:mate, e.g. --mix-ratio 70:30',
    );
  } else if (mate) {
    mode = 'mate';
    groups = [{ label: 'mate', percentage: 100, criterion: mateCriterion(mate) }];
    title = mateTitle(mate);
    description = mateDescription(mate);
    corpusFilter.anyTags = mateTags(mate);
    corpusFilter.requiredTags = ['mate'];
  } else if (tactical) {
    mode = 'tactical';
    groups = [{ label: 'tactical', percentage: 100, criterion: tacticalCriterion(tactical) }];
    title = 'Tactical Chess Puzzles';
    description = tacticalDescription(tactical);
    if (tactical.themes.length > 0) {
      corpusFilter.anyTags = tactical.themes;
    }
    if (tactical.plies.length > 0) {
      corpusFilter.plyCounts = tactical.plies;
    }
  } else {
    throw new ConfigError(
      'No puzzle type selected',
      `Choose mates with one of ${MATE_OPTIONS}, tactics with --themes or --ply, or both with --mix-ratio`,
    );
  }

  const request: PuzzleSetRequest = { groups, targetCount: count };
  if (options.minRating !== undefined) {
    request.minRating = options.minRating;
    corpusFilter.minRating = options.minRating;
  }
  if (options.maxRating !== undefined) {
    request.maxRating = options.maxRating;
    corpusFilter.maxRating = options.maxRating;
  }
  if (options.progressive !== undefined) {
    request.progressive = options.progressive;
  }

  const plan: SelectionPlan = {
    mode,
    title: options.title ?? title,
    description,
    request,
    corpusFilter,
    readLimit: Math.ceil(count * config.corpus.oversample),
  };
  if (options.showMateCount) {
    plan.showMateCount = true;
  }
  return plan;
}
