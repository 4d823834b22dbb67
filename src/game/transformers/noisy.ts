import type { Transformer, WrapperFunction } from './types';
import { createStrategyTransformer } from './factory';
import { assertProbability } from './validation';
import { flipAction } from '../core/actions';

/**
 * Noisy: flip the proposed action with probability `noise`.
 *
 * Draws exactly once per decision, including at noise 0 and 1.
 */
export const noisyWrapper: WrapperFunction<[noise: number]> = (ctx, proposed, noise) => {
  const r = ctx.rng.random();
  return r < noise ? flipAction(proposed) : proposed;
};

export function noisyTransformer(noise: number, namePrefix = 'Noisy'): Transformer {
  assertProbability('noise', noise);
  return createStrategyTransformer(noisyWrapper, [noise], namePrefix);
}
