/**
 * Strategy transformer factory.
 *
 * Turns (wrapper, bound arguments, name prefix) into a Transformer. Applying it
 * to a player type yields a derived type that decides by asking the base
 * strategy for a proposal and passing it through the wrapper.
 *
 * The transformer holds only the wrapper template and its arguments. Wrapper
 * state is allocated per strategy instance, i.e. once per Player.
 */

import type { Action, DecisionContext } from '../types';
import type { PlayerType, Strategy } from '../strategies/types';
import type { StatefulWrapper, StrategyWrapper, Transformer } from './types';
import { TransformerConfigError } from '../types/config';

/**
 * Check a player type satisfies the contract a transformer relies on.
 */
function validateBase(base: PlayerType, namePrefix: string): void {
  const problems: string[] = [];
  if (typeof base.id !== 'string') problems.push('id must be a string');
  if (typeof base.name !== 'string') problems.push('name must be a string');
  if (typeof base.createStrategy !== 'function') problems.push('createStrategy must be a function');

  if (problems.length > 0) {
    throw new TransformerConfigError(
      `cannot apply ${namePrefix || 'transformer'} to player type: ${problems.join(', ')}`,
      { base, problems }
    );
  }
}

function validateWrapper<TState, TArgs extends readonly unknown[]>(
  wrapper: StatefulWrapper<TState, TArgs>,
  namePrefix: string
): void {
  if (typeof wrapper.createState !== 'function' || typeof wrapper.apply !== 'function') {
    throw new TransformerConfigError(
      `${namePrefix || 'transformer'} wrapper must be a function or provide createState() and apply()`,
      { wrapper }
    );
  }
}

/**
 * Derive id and display name. The id gets the prefix concatenated,
 * the display name gets prefix plus a space.
 */
export function prefixIdentity(base: Pick<PlayerType, 'id' | 'name'>, namePrefix: string): { id: string; name: string } {
  if (!namePrefix) {
    return { id: base.id, name: base.name };
  }
  return {
    id: namePrefix + base.id,
    name: `${namePrefix} ${base.name}`
  };
}

/**
 * Create a transformer from a wrapper.
 *
 * @param wrapper Stateless function, or a template whose state is built per player
 * @param args Extra arguments bound now and passed to every wrapper call
 * @param namePrefix Default prefix for the derived id and name; apply() may override it
 */
export function createStrategyTransformer<TState, TArgs extends readonly unknown[]>(
  wrapper: StrategyWrapper<TState, TArgs>,
  args: [...TArgs],
  namePrefix = ''
): Transformer {
  return {
    namePrefix,
    apply(base: PlayerType, prefix: string = namePrefix): PlayerType {
      validateBase(base, prefix);
      if (typeof wrapper !== 'function') {
        validateWrapper(wrapper, prefix);
      }

      const identity = prefixIdentity(base, prefix);

      const createStrategy = (): Strategy => {
        const inner = base.createStrategy();

        if (typeof wrapper === 'function') {
          const wrap = wrapper;
          return {
            decide: (ctx: DecisionContext): Action => wrap(ctx, inner.decide(ctx), ...args),
            layers: inner.layers
          };
        }

        const template = wrapper;
        const state = template.createState();
        return {
          decide: (ctx: DecisionContext): Action => template.apply(ctx, inner.decide(ctx), state, ...args),
          layers: [...inner.layers, { owner: identity.id, state }]
        };
      };

      return {
        ...base,
        id: identity.id,
        name: identity.name,
        createStrategy
      };
    }
  };
}
