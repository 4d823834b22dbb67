import type { Action } from './types';

export const ACTIONS = {
  COOPERATE: 'C' as const,
  DEFECT: 'D' as const,
};

// Match length sentinel when players are not told how many rounds remain
export const UNKNOWN_LENGTH = -1 as const;

// Initial/final sequence transformers fall back to this when given none
export const DEFAULT_SEQUENCE: readonly Action[] = [ACTIONS.DEFECT, ACTIONS.DEFECT, ACTIONS.DEFECT];
