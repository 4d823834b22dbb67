// Public API exports for the strategy transformer engine
export type {
  Action,
  MatchAttributes,
  PlayerView,
  DecisionContext,
  Round
} from './types';

export type { MatchOptions } from './types/config';
export { TransformerConfigError } from './types/config';

export {
  ACTIONS,
  UNKNOWN_LENGTH,
  DEFAULT_SEQUENCE
} from './constants';

// Action domain
export {
  flipAction,
  randomChoice,
  isAction,
  parseActions,
  actionsToString,
  actionToLabel
} from './core/actions';

// Random source
export type { RandomGenerator } from './core/random';
export { defaultRng, SeededRandom, createSeededRandom } from './core/random';

// Players and matches
export { Player } from './core/player';
export { playMatch, type MatchResult } from './core/match';

// Strategies
export * from './strategies';

// Transformers
export * from './transformers';
