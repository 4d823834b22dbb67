// Single transformer surface - transformers only rewrite a player type's decision
import type { Action, DecisionContext } from '../types';
import type { PlayerType } from '../strategies/types';
import type { TransformerConfig, TransformerType } from '../types/config';

/**
 * Stateless wrapper: receives the base strategy's proposed action and returns
 * the action actually played.
 */
export type WrapperFunction<TArgs extends readonly unknown[] = []> = (
  ctx: DecisionContext,
  proposed: Action,
  ...args: TArgs
) => Action;

/**
 * Stateful wrapper template.
 *
 * createState runs once per Player; the state is handed to apply explicitly
 * on every decision and is never shared with another player.
 */
export interface StatefulWrapper<TState, TArgs extends readonly unknown[] = []> {
  createState(): TState;
  apply(ctx: DecisionContext, proposed: Action, state: TState, ...args: TArgs): Action;
}

export type StrategyWrapper<TState, TArgs extends readonly unknown[] = []> =
  | WrapperFunction<TArgs>
  | StatefulWrapper<TState, TArgs>;

/**
 * Transformer: derives a new player type from an existing one.
 * Compose by applying one transformer's output to another.
 */
export interface Transformer {
  /** Prepended to the derived id, and with a space to the derived name; '' leaves both unchanged */
  readonly namePrefix: string;
  /** Derive from base; namePrefix, when given, replaces the default for this application only */
  apply(base: PlayerType, namePrefix?: string): PlayerType;
}

// Factory for parameterized transformers, keyed by config type
export type TransformerFactory<T extends TransformerType = TransformerType> = (
  config: Extract<TransformerConfig, { type: T }>
) => Transformer;

export type { TransformerConfig, TransformerType };
