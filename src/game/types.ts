import type { RandomGenerator } from './core/random';

// ============= ACTIONS =============
// 'C' = cooperate, 'D' = defect
export type Action = 'C' | 'D';

// ============= MATCH =============

/**
 * What a player is told about the match it is playing.
 * length is UNKNOWN_LENGTH (-1) when the number of rounds is hidden.
 */
export interface MatchAttributes {
  length: number;
}

/**
 * Read-only view of a live player, as seen by strategies and wrappers.
 * History is append-only and only the match runner writes to it.
 */
export interface PlayerView {
  readonly name: string;
  readonly history: readonly Action[];
  readonly matchAttributes: Readonly<MatchAttributes>;
}

/**
 * Everything a single decision may look at.
 * The random source is injected so matches can be replayed from a seed.
 */
export interface DecisionContext {
  readonly self: PlayerView;
  readonly opponent: PlayerView;
  readonly rng: RandomGenerator;
}

/** One round of a match: [first player's action, second player's action] */
export type Round = [Action, Action];
