import type { Action } from '../types';
import type { StatefulWrapper } from './types';
import type { StrategyLayer } from '../strategies/types';
import { createStrategyTransformer } from './factory';

/**
 * Per-player log of the actions a tracking wrapper has seen.
 */
export class RecordedHistory {
  readonly actions: Action[] = [];
}

/**
 * Observer: append the action it receives and pass it on unchanged.
 *
 * Applied outermost, the log equals what the player actually played.
 */
export const historyTrackWrapper: StatefulWrapper<RecordedHistory> = {
  createState: () => new RecordedHistory(),

  apply(_ctx, proposed, log) {
    log.actions.push(proposed);
    return proposed;
  }
};

export const trackHistoryTransformer = createStrategyTransformer(historyTrackWrapper, [], 'HistoryTracking');

/**
 * Actions recorded by the outermost history tracker on a player,
 * or undefined if its type was never tracked.
 */
export function getRecordedHistory(player: { readonly strategyLayers: readonly StrategyLayer[] }): readonly Action[] | undefined {
  for (let i = player.strategyLayers.length - 1; i >= 0; i--) {
    const state = player.strategyLayers[i]?.state;
    if (state instanceof RecordedHistory) {
      return state.actions;
    }
  }
  return undefined;
}
