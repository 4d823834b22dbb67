import type { RandomGenerator } from '../../game/core/random';

/**
 * Random source that replays a fixed list of draws, for exact assertions
 * on stochastic wrappers. Throws once the list runs out.
 */
export class ScriptedRandom implements RandomGenerator {
  private readonly values: readonly number[];
  draws = 0;

  constructor(values: readonly number[]) {
    this.values = values;
  }

  random(): number {
    const value = this.values[this.draws];
    if (value === undefined) {
      throw new Error(`ScriptedRandom: exhausted after ${this.draws} draws`);
    }
    this.draws++;
    return value;
  }
}

/** Random source that must never be consulted */
export const forbiddenRng: RandomGenerator = {
  random: () => {
    throw new Error('forbiddenRng: unexpected random draw');
  }
};
