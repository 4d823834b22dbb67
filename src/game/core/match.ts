/**
 * Minimal match runner for exercising strategies and transformers.
 * Plays rounds and advances histories; scoring is left to callers.
 */

import type { Round } from '../types';
import type { MatchOptions } from '../types/config';
import type { Player } from './player';
import { createSeededRandom, defaultRng } from './random';
import { actionsToString } from './actions';
import { UNKNOWN_LENGTH } from '../constants';

/**
 * Result of a match
 */
export interface MatchResult {
  /** Number of rounds played */
  turns: number;
  /** Display names [first, second] */
  players: [string, string];
  /** Actions per round, in order */
  rounds: Round[];
}

const DEFAULT_MATCH_OPTIONS = {
  lengthKnown: true,
  verbose: false
};

/**
 * Play a match between two players.
 *
 * Both players are reset first. Each round both decide against the other's
 * history before either history grows.
 */
export function playMatch(first: Player, second: Player, options: MatchOptions): MatchResult {
  const { turns, seed, rng: injectedRng } = options;
  // Per field: an explicit undefined still gets the default
  const lengthKnown = options.lengthKnown ?? DEFAULT_MATCH_OPTIONS.lengthKnown;
  const verbose = options.verbose ?? DEFAULT_MATCH_OPTIONS.verbose;

  if (!Number.isInteger(turns) || turns < 1) {
    throw new Error(`playMatch: turns must be a positive integer, got ${turns}`);
  }
  if (first === second) {
    throw new Error(`playMatch: ${first.name} cannot play against its own instance`);
  }

  const rng = injectedRng ?? (seed !== undefined ? createSeededRandom(seed) : defaultRng);
  const length = lengthKnown ? turns : UNKNOWN_LENGTH;
  first.reset({ length });
  second.reset({ length });

  const rounds: Round[] = [];
  for (let turn = 0; turn < turns; turn++) {
    const firstAction = first.strategy(second, rng);
    const secondAction = second.strategy(first, rng);
    first.record(firstAction);
    second.record(secondAction);
    rounds.push([firstAction, secondAction]);

    if (verbose) console.log(`Round ${turn + 1}: ${first.name}=${firstAction} ${second.name}=${secondAction}`);
  }

  if (verbose) {
    console.log(`${first.name}: ${actionsToString(first.history)}`);
    console.log(`${second.name}: ${actionsToString(second.history)}`);
  }

  return {
    turns,
    players: [first.name, second.name],
    rounds
  };
}
