import type { Action, DecisionContext } from '../types';
import type { Classifier, PlayerType } from './types';
import { ACTIONS } from '../constants';
import { actionsToString, flipAction, parseActions, randomChoice } from '../core/actions';

const { COOPERATE: C, DEFECT: D } = ACTIONS;

/**
 * Build a player type from a pure decision rule.
 *
 * The rule may only look at the context (histories, match attributes, rng);
 * anything it needs to remember has to be derivable from the histories.
 */
export function definePlayerType(
  id: string,
  name: string,
  classifier: Classifier,
  decide: (ctx: DecisionContext) => Action
): PlayerType {
  return {
    id,
    name,
    classifier,
    createStrategy: () => ({ decide, layers: [] })
  };
}

function lastOf(history: readonly Action[]): Action | undefined {
  return history[history.length - 1];
}

export const cooperator = definePlayerType(
  'Cooperator',
  'Cooperator',
  { stochastic: false, memoryDepth: 0 },
  () => C
);

export const defector = definePlayerType(
  'Defector',
  'Defector',
  { stochastic: false, memoryDepth: 0 },
  () => D
);

/**
 * Cooperates first, then plays the opposite of its own previous action.
 *
 * Reads its own history, so under a transformer it alternates around
 * the transformed actions rather than its own proposals.
 */
export const alternator = definePlayerType(
  'Alternator',
  'Alternator',
  { stochastic: false, memoryDepth: 1 },
  ({ self }) => {
    const last = lastOf(self.history);
    return last === undefined ? C : flipAction(last);
  }
);

/** Cooperates first, then copies the opponent's previous action */
export const titForTat = definePlayerType(
  'TitForTat',
  'Tit For Tat',
  { stochastic: false, memoryDepth: 1 },
  ({ opponent }) => lastOf(opponent.history) ?? C
);

/** Cooperates until the opponent defects once, then defects forever */
export const grudger = definePlayerType(
  'Grudger',
  'Grudger',
  { stochastic: false, memoryDepth: Infinity },
  ({ opponent }) => (opponent.history.includes(D) ? D : C)
);

export function randomPlayer(p = 0.5): PlayerType {
  return definePlayerType(
    'Random',
    `Random: ${p}`,
    { stochastic: true, memoryDepth: 0 },
    ({ rng }) => randomChoice(p, rng)
  );
}

/**
 * Repeats a fixed pattern of actions, e.g. "CCD".
 */
export function cycler(pattern: string): PlayerType {
  const actions = parseActions(pattern);
  if (!actions || actions.length === 0) {
    throw new Error(`cycler: pattern must be a non-empty string of C and D, got "${pattern}"`);
  }
  const label = actionsToString(actions);

  return definePlayerType(
    `Cycler${label}`,
    `Cycler ${label}`,
    { stochastic: false, memoryDepth: actions.length - 1 },
    ({ self }) => actions[self.history.length % actions.length] ?? C
  );
}
