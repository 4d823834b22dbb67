import type { StatefulWrapper, Transformer } from './types';
import { createStrategyTransformer } from './factory';
import { ACTIONS } from '../constants';

/**
 * Per-player state for retaliate-until-apology. Starts calm.
 */
export class RetaliationState {
  isRetaliating = false;
}

/**
 * Retaliate until apology: once the opponent defects, keep defecting until
 * the opponent cooperates again, then answer that cooperation with
 * cooperation and go back to the base strategy.
 *
 * Calm → Retaliating when the opponent's last action was D.
 * Retaliating → Calm (playing C) when the opponent's last action was C.
 */
export const retaliationWrapper: StatefulWrapper<RetaliationState> = {
  createState: () => new RetaliationState(),

  apply(ctx, proposed, state) {
    const opponentLast = ctx.opponent.history[ctx.opponent.history.length - 1];
    if (ctx.self.history.length === 0 || opponentLast === undefined) {
      return proposed;
    }

    if (opponentLast === ACTIONS.DEFECT) {
      state.isRetaliating = true;
    }

    if (state.isRetaliating) {
      if (opponentLast === ACTIONS.COOPERATE) {
        state.isRetaliating = false;
        return ACTIONS.COOPERATE;
      }
      return ACTIONS.DEFECT;
    }

    return proposed;
  }
};

export function retaliateUntilApologyTransformer(namePrefix = 'RUA'): Transformer {
  return createStrategyTransformer(retaliationWrapper, [], namePrefix);
}
