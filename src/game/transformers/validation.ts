import type { Action } from '../types';
import { TransformerConfigError } from '../types/config';
import { isAction } from '../core/actions';
import { DEFAULT_SEQUENCE } from '../constants';

export function assertProbability(label: string, value: number): void {
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0 || value > 1) {
    throw new TransformerConfigError(`${label} must be a probability in [0, 1], got ${value}`, { [label]: value });
  }
}

/**
 * Copy a sequence for binding into a transformer.
 * Missing or empty sequences fall back to DEFAULT_SEQUENCE.
 */
export function resolveSequence(label: string, sequence: readonly Action[] | undefined): Action[] {
  if (!sequence || sequence.length === 0) {
    return [...DEFAULT_SEQUENCE];
  }
  const invalid = sequence.filter(action => !isAction(action));
  if (invalid.length > 0) {
    throw new TransformerConfigError(`${label} sequence may only contain 'C' and 'D'`, { sequence });
  }
  return [...sequence];
}
