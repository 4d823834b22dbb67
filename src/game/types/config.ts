/**
 * Serializable configuration types for transformers and matches.
 * Lives under src/game to avoid upward dependencies from core modules.
 */

import type { Action } from '../types';
import type { RandomGenerator } from '../core/random';

interface PrefixOverride {
  /** Replace the transformer's default name prefix ('' for none) */
  namePrefix?: string;
}

/**
 * Serializable transformer configuration.
 *
 * Pipelines of these are applied left-to-right by applyTransformers.
 */
export type TransformerConfig =
  | ({ type: 'flip' } & PrefixOverride)
  | ({ type: 'noisy'; noise: number } & PrefixOverride)
  | ({ type: 'forgiver'; p: number } & PrefixOverride)
  | ({ type: 'initial'; sequence?: Action[] } & PrefixOverride)
  | ({ type: 'final'; sequence?: Action[] } & PrefixOverride)
  | ({ type: 'retaliate-until-apology' } & PrefixOverride)
  | ({ type: 'track-history' } & PrefixOverride);

export type TransformerType = TransformerConfig['type'];

/**
 * Error thrown when a transformer is built or applied with invalid configuration:
 * a malformed wrapper, a base player type missing part of its contract,
 * an out-of-range probability or an unparseable transformer spec.
 */
export class TransformerConfigError extends Error {
  details?: unknown;

  constructor(reason: string, details?: unknown) {
    super(`Invalid transformer configuration: ${reason}`);
    this.name = 'TransformerConfigError';
    this.details = details;
  }
}

/**
 * Options for playing a single match
 */
export interface MatchOptions {
  /** Number of rounds */
  turns: number;
  /** Tell players the match length (otherwise they see UNKNOWN_LENGTH) */
  lengthKnown?: boolean;
  /** Seed for a SeededRandom shared by both players; ignored when rng is given */
  seed?: number;
  /** Explicit random source */
  rng?: RandomGenerator;
  /** Log every round */
  verbose?: boolean;
}
