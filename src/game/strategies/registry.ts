/**
 * Strategy registry - lookup of the built-in player types by name.
 *
 * Parameterized strategies (random, cycler) are registered with their defaults;
 * build other variants with randomPlayer(p) / cycler(pattern) directly.
 */

import type { PlayerType } from './types';
import { alternator, cooperator, cycler, defector, grudger, randomPlayer, titForTat } from './basic';

export const STRATEGY_REGISTRY: Record<string, PlayerType> = {
  'cooperator': cooperator,
  'defector': defector,
  'alternator': alternator,
  'tit-for-tat': titForTat,
  'grudger': grudger,
  'random': randomPlayer(),
  'cycler': cycler('CCD')
};

/**
 * Get a player type by name from the registry.
 *
 * @throws Error if the strategy is not registered
 */
export function getStrategyByName(name: string): PlayerType {
  const playerType = STRATEGY_REGISTRY[name];
  if (!playerType) {
    throw new Error(`Unknown strategy: ${name}`);
  }
  return playerType;
}
