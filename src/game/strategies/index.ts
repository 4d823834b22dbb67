export type { PlayerType, Strategy, StrategyLayer, Classifier } from './types';
export {
  definePlayerType,
  cooperator,
  defector,
  alternator,
  titForTat,
  grudger,
  randomPlayer,
  cycler
} from './basic';
export { STRATEGY_REGISTRY, getStrategyByName } from './registry';
