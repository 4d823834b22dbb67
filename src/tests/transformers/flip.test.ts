import { describe, it, expect } from 'vitest';
import { flipTransformer } from '../../game/transformers/flip';
import { alternator, cooperator, defector, titForTat } from '../../game/strategies/basic';
import { playAgainstScript, playTypes } from '../helpers';

describe('Flip transformer', () => {
  it('should be named with the Flipped prefix', () => {
    const Flipped = flipTransformer.apply(cooperator);

    expect(flipTransformer.namePrefix).toBe('Flipped');
    expect(Flipped.id).toBe('FlippedCooperator');
    expect(Flipped.name).toBe('Flipped Cooperator');
  });

  it('should always defect when the base always cooperates', () => {
    expect(playTypes(flipTransformer.apply(cooperator), defector, { turns: 5 })[0]).toBe('DDDDD');
  });

  it('should always cooperate when the base always defects', () => {
    expect(playTypes(flipTransformer.apply(defector), defector, { turns: 3 })[0]).toBe('CCC');
  });

  it('should restore the base when applied twice', () => {
    const twice = flipTransformer.apply(flipTransformer.apply(titForTat));

    expect(twice.name).toBe('Flipped Flipped Tit For Tat');
    expect(playAgainstScript(twice, 'CDDCD')).toBe(playAgainstScript(titForTat, 'CDDCD'));
  });

  it('should invert a reactive strategy round by round', () => {
    // Tit For Tat proposes C, C, D, C against C, D, C, D
    expect(playAgainstScript(flipTransformer.apply(titForTat), 'CDCD')).toBe('DDCD');
  });

  it('should feed the flipped history back into a strategy that reads its own moves', () => {
    // Alternator sees its last move as D every round, proposes C, which is flipped to D
    expect(playTypes(flipTransformer.apply(alternator), cooperator, { turns: 4 })[0]).toBe('DDDD');
  });
});
