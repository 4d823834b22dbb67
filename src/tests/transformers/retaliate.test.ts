/**
 * Tests for retaliate-until-apology.
 *
 * State machine: Calm → Retaliating when the opponent's last move was D;
 * Retaliating → Calm (answering with C) when the opponent's last move was C.
 * The first round always plays the base strategy.
 */

import { describe, it, expect } from 'vitest';
import { retaliateUntilApologyTransformer } from '../../game/transformers/retaliate';
import { alternator, cooperator, defector } from '../../game/strategies/basic';
import { Player } from '../../game/core/player';
import { actionsToString } from '../../game/core/actions';
import { playAgainstScript, playTypes } from '../helpers';

describe('Retaliate-until-apology transformer', () => {
  const Rua = retaliateUntilApologyTransformer();

  it('should be named with the RUA prefix by default', () => {
    expect(Rua.apply(cooperator).id).toBe('RUACooperator');
    expect(Rua.apply(cooperator).name).toBe('RUA Cooperator');
    expect(retaliateUntilApologyTransformer('Vengeful').apply(cooperator).name).toBe('Vengeful Cooperator');
  });

  it('should react one round after a defection and after the apology', () => {
    expect(playAgainstScript(Rua.apply(cooperator), 'CDDCC')).toBe('CCDDC');
  });

  it('should keep retaliating against a constant defector', () => {
    expect(playTypes(Rua.apply(cooperator), defector, { turns: 4 })[0]).toBe('CDDD');
  });

  it('should forgive each apology immediately', () => {
    expect(playAgainstScript(Rua.apply(cooperator), 'DCDCC')).toBe('CDCDC');
  });

  it('should play the base strategy on the first round even against a defector', () => {
    expect(playTypes(Rua.apply(defector), defector, { turns: 1 })[0]).toBe('D');
  });

  it('should pass the base strategy through while calm', () => {
    expect(playTypes(Rua.apply(alternator), cooperator, { turns: 4 })[0]).toBe('CDCD');
    expect(playTypes(Rua.apply(defector), cooperator, { turns: 3 })[0]).toBe('DDD');
  });

  it('should keep state separate for two live players of the same type', () => {
    const Derived = Rua.apply(cooperator);
    const provoked = new Player(Derived);
    const calm = new Player(Derived);
    const bully = new Player(defector);
    const friend = new Player(cooperator);

    // Two matches advanced in lockstep
    for (let round = 0; round < 4; round++) {
      const provokedMove = provoked.strategy(bully);
      const bullyMove = bully.strategy(provoked);
      const calmMove = calm.strategy(friend);
      const friendMove = friend.strategy(calm);
      provoked.record(provokedMove);
      bully.record(bullyMove);
      calm.record(calmMove);
      friend.record(friendMove);
    }

    expect(actionsToString(provoked.history)).toBe('CDDD');
    expect(actionsToString(calm.history)).toBe('CCCC');
  });

  it('should keep state separate across base types', () => {
    const RuaCooperator = Rua.apply(cooperator);
    const RuaAlternator = Rua.apply(alternator);

    expect(playTypes(RuaCooperator, defector, { turns: 3 })[0]).toBe('CDD');
    expect(playTypes(RuaAlternator, cooperator, { turns: 3 })[0]).toBe('CDC');
  });
});
