import type { Action } from '../types';
import type { RandomGenerator } from './random';
import { ACTIONS } from '../constants';

/**
 * Swap cooperate and defect. Its own inverse.
 */
export function flipAction(action: Action): Action {
  return action === ACTIONS.COOPERATE ? ACTIONS.DEFECT : ACTIONS.COOPERATE;
}

/**
 * Bernoulli trial: cooperate with probability p, defect otherwise.
 *
 * p = 0 and p = 1 are decided without drawing from the generator.
 */
export function randomChoice(p: number, rng: RandomGenerator): Action {
  if (p <= 0) return ACTIONS.DEFECT;
  if (p >= 1) return ACTIONS.COOPERATE;
  return rng.random() < p ? ACTIONS.COOPERATE : ACTIONS.DEFECT;
}

export function isAction(value: unknown): value is Action {
  return value === ACTIONS.COOPERATE || value === ACTIONS.DEFECT;
}

/**
 * Parse a compact action string such as "CCD" into actions.
 * Returns null if any character is not C or D.
 */
export function parseActions(text: string): Action[] | null {
  const actions: Action[] = [];
  for (const char of text.toUpperCase()) {
    if (!isAction(char)) return null;
    actions.push(char);
  }
  return actions;
}

export function actionsToString(actions: readonly Action[]): string {
  return actions.join('');
}

export function actionToLabel(action: Action): string {
  return action === ACTIONS.COOPERATE ? 'Cooperate' : 'Defect';
}
