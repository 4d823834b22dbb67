/**
 * Architecture tests for transformer composition.
 *
 * Verifies:
 * 1. Composition order is observable (and where it is not)
 * 2. One transformer applied to several bases yields independent types
 * 3. Stateful derived types never share state between live players
 * 4. Wrappers only draw randomness from the injected source
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  Player,
  cooperator,
  defector,
  titForTat,
  flipTransformer,
  noisyTransformer,
  initialTransformer,
  retaliateUntilApologyTransformer,
  trackHistoryTransformer,
  getRecordedHistory,
  playMatch
} from '../../game';
import { playTypes, testLog } from '../helpers';

// Get __dirname equivalent in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

describe('Architecture: Transformer Composition', () => {
  describe('composition order', () => {
    it('should commute flip with certain noise', () => {
      const flipOfNoisy = flipTransformer.apply(noisyTransformer(1).apply(cooperator));
      const noisyOfFlip = noisyTransformer(1).apply(flipTransformer.apply(cooperator));

      const [a] = playTypes(flipOfNoisy, defector, { turns: 4, seed: 7 });
      const [b] = playTypes(noisyOfFlip, defector, { turns: 4, seed: 7 });

      expect(a).toBe('CCCC');
      expect(b).toBe('CCCC');
      expect(flipOfNoisy.name).toBe('Flipped Noisy Cooperator');
      expect(noisyOfFlip.name).toBe('Noisy Flipped Cooperator');
    });

    it('should not commute flip with an initial sequence', () => {
      const flipOfInitial = flipTransformer.apply(initialTransformer(['D']).apply(cooperator));
      const initialOfFlip = initialTransformer(['D']).apply(flipTransformer.apply(cooperator));

      const [a] = playTypes(flipOfInitial, cooperator, { turns: 3 });
      const [b] = playTypes(initialOfFlip, cooperator, { turns: 3 });
      testLog({ flipOfInitial: a, initialOfFlip: b });

      expect(a).toBe('CDD');
      expect(b).toBe('DDD');
    });
  });

  describe('independence', () => {
    it('should derive distinct types from one transformer', () => {
      const Rua = retaliateUntilApologyTransformer();
      const first = Rua.apply(cooperator);
      const second = Rua.apply(titForTat);
      const again = Rua.apply(cooperator);

      expect(first.id).toBe('RUACooperator');
      expect(second.id).toBe('RUATitForTat');
      expect(again).not.toBe(first);
      expect(again.id).toBe(first.id);
    });

    it('should keep tracked logs apart across simultaneous matches', () => {
      const Tracked = trackHistoryTransformer.apply(retaliateUntilApologyTransformer().apply(cooperator));
      const inHostileMatch = new Player(Tracked);
      const inFriendlyMatch = new Player(Tracked);

      playMatch(inHostileMatch, new Player(defector), { turns: 3 });
      playMatch(inFriendlyMatch, new Player(cooperator), { turns: 3 });

      expect(getRecordedHistory(inHostileMatch)).toEqual(['C', 'D', 'D']);
      expect(getRecordedHistory(inFriendlyMatch)).toEqual(['C', 'C', 'C']);
    });
  });

  describe('randomness', () => {
    it('should never call Math.random from a transformer', () => {
      const transformersDir = path.join(__dirname, '../../game/transformers');
      const offenders = fs
        .readdirSync(transformersDir)
        .filter(file => file.endsWith('.ts'))
        .filter(file => fs.readFileSync(path.join(transformersDir, file), 'utf-8').includes('Math.random'));

      expect(offenders).toEqual([]);
    });
  });
});
