import type { Action, MatchAttributes, PlayerView } from '../types';
import type { PlayerType, Strategy, StrategyLayer } from '../strategies/types';
import type { RandomGenerator } from './random';
import { defaultRng } from './random';
import { UNKNOWN_LENGTH } from '../constants';

/**
 * A live participant in a match.
 *
 * Owns its history, its match attributes and exactly one Strategy built from
 * its player type, so wrapper state is never shared between two players.
 */
export class Player implements PlayerView {
  readonly type: PlayerType;
  readonly history: Action[] = [];
  matchAttributes: MatchAttributes = { length: UNKNOWN_LENGTH };
  private strategyInstance: Strategy;

  constructor(type: PlayerType) {
    this.type = type;
    this.strategyInstance = type.createStrategy();
  }

  get name(): string {
    return this.type.name;
  }

  get id(): string {
    return this.type.id;
  }

  /** Wrapper state held by this player's strategy, innermost first */
  get strategyLayers(): readonly StrategyLayer[] {
    return this.strategyInstance.layers;
  }

  /**
   * Decide this round's action. Does not record it; the match runner does.
   */
  strategy(opponent: PlayerView, rng: RandomGenerator = defaultRng): Action {
    return this.strategyInstance.decide({ self: this, opponent, rng });
  }

  record(action: Action): void {
    this.history.push(action);
  }

  /**
   * Clear history and rebuild the strategy, discarding all wrapper state.
   */
  reset(matchAttributes: MatchAttributes = { length: UNKNOWN_LENGTH }): void {
    this.history.length = 0;
    this.matchAttributes = { ...matchAttributes };
    this.strategyInstance = this.type.createStrategy();
  }
}
