/**
 * Initial and final sequence transformers.
 *
 * Both override the base strategy for a fixed run of rounds and leave it alone
 * otherwise. Neither carries a name prefix unless one is given.
 *
 * Round indexing: the round being decided is self.history.length (0-based),
 * since the match runner records an action only after both players decide.
 */

import type { Action } from '../types';
import type { Transformer, WrapperFunction } from './types';
import { createStrategyTransformer } from './factory';
import { resolveSequence } from './validation';

/**
 * Play sequence[i] in round i while i < sequence.length, then the base strategy.
 */
export const initialSequenceWrapper: WrapperFunction<[sequence: readonly Action[]]> = (ctx, proposed, sequence) => {
  const index = ctx.self.history.length;
  return sequence[index] ?? proposed;
};

/**
 * End the match with the given sequence: the last round plays the last entry,
 * the one before it the second-to-last, and so on.
 *
 * Inert when the match length is unknown (negative).
 */
export const finalSequenceWrapper: WrapperFunction<[sequence: readonly Action[]]> = (ctx, proposed, sequence) => {
  const length = ctx.self.matchAttributes.length;
  if (length < 0) {
    return proposed;
  }

  // Rounds left including this one: 1 on the last round
  const remaining = length - ctx.self.history.length;
  if (remaining < 1 || remaining > sequence.length) {
    return proposed;
  }
  return sequence[sequence.length - remaining] ?? proposed;
};

export function initialTransformer(sequence?: readonly Action[], namePrefix = ''): Transformer {
  return createStrategyTransformer(initialSequenceWrapper, [resolveSequence('initial', sequence)], namePrefix);
}

export function finalTransformer(sequence?: readonly Action[], namePrefix = ''): Transformer {
  return createStrategyTransformer(finalSequenceWrapper, [resolveSequence('final', sequence)], namePrefix);
}
