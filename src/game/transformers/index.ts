/**
 * Transformers module - composable modifications of player types.
 */

// Types
export type {
  Transformer,
  TransformerFactory,
  TransformerConfig,
  TransformerType,
  StrategyWrapper,
  StatefulWrapper,
  WrapperFunction
} from './types';

// Engine
export { createStrategyTransformer, prefixIdentity } from './factory';

// Built-in transformers
export { flipTransformer, flipWrapper } from './flip';
export { noisyTransformer, noisyWrapper } from './noisy';
export { forgiverTransformer, forgiverWrapper } from './forgiver';
export { initialTransformer, finalTransformer, initialSequenceWrapper, finalSequenceWrapper } from './sequences';
export { retaliateUntilApologyTransformer, retaliationWrapper, RetaliationState } from './retaliate';
export { trackHistoryTransformer, historyTrackWrapper, RecordedHistory, getRecordedHistory } from './history';

// Composition
export { TRANSFORMER_TYPES, getTransformer, applyTransformers, parseTransformerSpec } from './registry';
