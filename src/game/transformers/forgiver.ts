import type { Transformer, WrapperFunction } from './types';
import { createStrategyTransformer } from './factory';
import { assertProbability } from './validation';
import { randomChoice } from '../core/actions';
import { ACTIONS } from '../constants';

/**
 * Forgiver: a proposed defection becomes cooperation with probability p.
 * Proposed cooperation is left alone.
 */
export const forgiverWrapper: WrapperFunction<[p: number]> = (ctx, proposed, p) => {
  if (proposed === ACTIONS.DEFECT) {
    return randomChoice(p, ctx.rng);
  }
  return ACTIONS.COOPERATE;
};

export function forgiverTransformer(p: number, namePrefix = 'Forgiving'): Transformer {
  assertProbability('p', p);
  return createStrategyTransformer(forgiverWrapper, [p], namePrefix);
}
