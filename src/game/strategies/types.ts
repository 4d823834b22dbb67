import type { Action, DecisionContext } from '../types';

/**
 * Wrapper-private state owned by one strategy instance.
 *
 * owner is the id of the derived player type whose wrapper allocated it.
 */
export interface StrategyLayer {
  readonly owner: string;
  readonly state: unknown;
}

/**
 * A live decision procedure. One per Player; never shared.
 */
export interface Strategy {
  decide(ctx: DecisionContext): Action;
  /** Wrapper state held by this instance, innermost first */
  readonly layers: readonly StrategyLayer[];
}

export interface Classifier {
  /** Uses the random source */
  stochastic: boolean;
  /** Rounds of history consulted; Infinity for unbounded */
  memoryDepth: number;
}

/**
 * Description of a behaviour (not an instance).
 *
 * id is the programmatic identifier ("TitForTat"), name the display name ("Tit For Tat").
 * createStrategy is called once per Player, so any state it allocates is per instance.
 */
export interface PlayerType {
  readonly id: string;
  readonly name: string;
  readonly classifier: Readonly<Classifier>;
  createStrategy(): Strategy;
}
