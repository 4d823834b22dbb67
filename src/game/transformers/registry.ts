// Pure lookup - no registration, no side effects
import type { PlayerType } from '../strategies/types';
import type { Transformer, TransformerConfig, TransformerFactory, TransformerType } from './types';
import { TransformerConfigError } from '../types/config';
import { parseActions } from '../core/actions';
import { flipTransformer } from './flip';
import { noisyTransformer } from './noisy';
import { forgiverTransformer } from './forgiver';
import { finalTransformer, initialTransformer } from './sequences';
import { retaliateUntilApologyTransformer } from './retaliate';
import { trackHistoryTransformer } from './history';

type TransformerRegistry = { [T in TransformerType]: TransformerFactory<T> };

// Same transformer, applied under a different default prefix
function withDefaultPrefix(transformer: Transformer, namePrefix: string | undefined): Transformer {
  if (namePrefix === undefined) return transformer;
  return {
    namePrefix,
    apply: (base, prefix = namePrefix) => transformer.apply(base, prefix)
  };
}

const TRANSFORMER_REGISTRY: TransformerRegistry = {
  'flip': ({ namePrefix }) => withDefaultPrefix(flipTransformer, namePrefix),
  'noisy': ({ noise, namePrefix }) => noisyTransformer(noise, namePrefix),
  'forgiver': ({ p, namePrefix }) => forgiverTransformer(p, namePrefix),
  'initial': ({ sequence, namePrefix }) => initialTransformer(sequence, namePrefix),
  'final': ({ sequence, namePrefix }) => finalTransformer(sequence, namePrefix),
  'retaliate-until-apology': ({ namePrefix }) => retaliateUntilApologyTransformer(namePrefix),
  'track-history': ({ namePrefix }) => withDefaultPrefix(trackHistoryTransformer, namePrefix)
};

export const TRANSFORMER_TYPES: readonly TransformerType[] = [
  'flip',
  'noisy',
  'forgiver',
  'initial',
  'final',
  'retaliate-until-apology',
  'track-history'
];

function isTransformerType(type: string): type is TransformerType {
  return TRANSFORMER_TYPES.some(known => known === type);
}

/**
 * Get transformer for a config. Pure lookup - no side effects.
 */
export function getTransformer(config: TransformerConfig): Transformer {
  switch (config.type) {
    case 'flip':
      return TRANSFORMER_REGISTRY['flip'](config);
    case 'noisy':
      return TRANSFORMER_REGISTRY['noisy'](config);
    case 'forgiver':
      return TRANSFORMER_REGISTRY['forgiver'](config);
    case 'initial':
      return TRANSFORMER_REGISTRY['initial'](config);
    case 'final':
      return TRANSFORMER_REGISTRY['final'](config);
    case 'retaliate-until-apology':
      return TRANSFORMER_REGISTRY['retaliate-until-apology'](config);
    case 'track-history':
      return TRANSFORMER_REGISTRY['track-history'](config);
    default: {
      const unknownConfig: never = config;
      throw new TransformerConfigError(`Unknown transformer: ${JSON.stringify(unknownConfig)}`);
    }
  }
}

/**
 * Compose multiple transformers onto a base player type.
 * Transformers apply left-to-right: the first config wraps the base first,
 * so [a, b] yields b(a(base)).
 */
export function applyTransformers(base: PlayerType, configs: TransformerConfig[]): PlayerType {
  return configs
    .map(getTransformer)
    .reduce((playerType, transformer) => transformer.apply(playerType), base);
}

function parseProbability(type: string, raw: string | undefined): number {
  const value = raw === undefined || raw === '' ? NaN : Number(raw);
  if (Number.isNaN(value)) {
    throw new TransformerConfigError(`${type} needs a numeric parameter, e.g. "${type}:0.1"`, { raw });
  }
  return value;
}

function parseSequence(type: string, raw: string | undefined) {
  if (raw === undefined || raw === '') return undefined;
  const sequence = parseActions(raw);
  if (!sequence) {
    throw new TransformerConfigError(`${type} sequence must be made of C and D, got "${raw}"`, { raw });
  }
  return sequence;
}

/**
 * Parse a compact transformer spec such as "flip", "noisy:0.1" or "initial:DDC".
 *
 * Probabilities are range-checked when the transformer is built, not here.
 */
export function parseTransformerSpec(spec: string): TransformerConfig {
  const separator = spec.indexOf(':');
  const type = (separator === -1 ? spec : spec.slice(0, separator)).trim();
  const param = separator === -1 ? undefined : spec.slice(separator + 1).trim();

  if (!isTransformerType(type)) {
    throw new TransformerConfigError(`Unknown transformer: ${type}`, { spec, known: TRANSFORMER_TYPES });
  }

  switch (type) {
    case 'noisy':
      return { type, noise: parseProbability(type, param) };
    case 'forgiver':
      return { type, p: parseProbability(type, param) };
    case 'initial':
    case 'final': {
      const sequence = parseSequence(type, param);
      return sequence ? { type, sequence } : { type };
    }
    case 'flip':
    case 'retaliate-until-apology':
    case 'track-history':
      if (param !== undefined) {
        throw new TransformerConfigError(`${type} takes no parameter, got "${param}"`, { spec });
      }
      return { type };
  }
}
