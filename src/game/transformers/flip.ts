import type { WrapperFunction } from './types';
import { createStrategyTransformer } from './factory';
import { flipAction } from '../core/actions';

/**
 * Flip: play the opposite of whatever the base strategy proposes.
 */
export const flipWrapper: WrapperFunction = (_ctx, proposed) => flipAction(proposed);

export const flipTransformer = createStrategyTransformer(flipWrapper, [], 'Flipped');
