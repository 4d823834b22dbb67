#!/usr/bin/env npx tsx
/**
 * Play one match between two strategies, each optionally transformed.
 *
 * Usage:
 *   npx tsx scripts/run-match.ts <player> <opponent> [options]
 *
 * Options:
 *   --transform SPEC           Transform the first player (repeatable, applied in order)
 *   --opponent-transform SPEC  Transform the opponent (repeatable, applied in order)
 *   --turns N                  Number of rounds (default 10)
 *   --seed N                   Seed the random source (default 42)
 *   --unknown-length           Hide the match length from both players
 *   --verbose                  Print every round
 *
 * Transformer specs: flip, noisy:P, forgiver:P, initial[:SEQ], final[:SEQ],
 *                    retaliate-until-apology, track-history
 *
 * Examples:
 *   npx tsx scripts/run-match.ts tit-for-tat defector --transform noisy:0.1
 *   npx tsx scripts/run-match.ts cooperator alternator --transform initial:DD --transform flip --verbose
 */

import {
  Player,
  STRATEGY_REGISTRY,
  TRANSFORMER_TYPES,
  TransformerConfigError,
  actionsToString,
  applyTransformers,
  getRecordedHistory,
  getStrategyByName,
  parseTransformerSpec,
  playMatch,
  type TransformerConfig
} from '../src/game';
import { UsageError, parseIntegerOption } from './match-args';

function printUsage(): void {
  console.error('Usage: npx tsx scripts/run-match.ts <player> <opponent> [options]');
  console.error('\nOptions:');
  console.error('  --transform SPEC           Transform the first player (repeatable)');
  console.error('  --opponent-transform SPEC  Transform the opponent (repeatable)');
  console.error('  --turns N                  Number of rounds (default 10)');
  console.error('  --seed N                   Seed the random source (default 42)');
  console.error('  --unknown-length           Hide the match length from both players');
  console.error('  --verbose                  Print every round');
  console.error(`\nStrategies: ${Object.keys(STRATEGY_REGISTRY).join(', ')}`);
  console.error(`Transformers: ${TRANSFORMER_TYPES.join(', ')}`);
}

// Parse command line arguments
const args = process.argv.slice(2);
const positional: string[] = [];
const playerTransforms: TransformerConfig[] = [];
const opponentTransforms: TransformerConfig[] = [];
let turns = 10;
let seed = 42;
let lengthKnown = true;
let verbose = false;

try {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--transform':
        if (next) playerTransforms.push(parseTransformerSpec(next));
        i++;
        break;
      case '--opponent-transform':
        if (next) opponentTransforms.push(parseTransformerSpec(next));
        i++;
        break;
      case '--turns':
        if (next) turns = parseIntegerOption(arg, next, 1);
        i++;
        break;
      case '--seed':
        if (next) seed = parseIntegerOption(arg, next);
        i++;
        break;
      case '--unknown-length':
        lengthKnown = false;
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg !== undefined) positional.push(arg);
    }
  }

  const [playerName, opponentName] = positional;
  if (!playerName || !opponentName) {
    printUsage();
    process.exit(1);
  }

  const player = new Player(applyTransformers(getStrategyByName(playerName), playerTransforms));
  const opponent = new Player(applyTransformers(getStrategyByName(opponentName), opponentTransforms));

  const result = playMatch(player, opponent, { turns, seed, lengthKnown, verbose });

  console.log(`${result.players[0]} vs ${result.players[1]} (${result.turns} turns, seed ${seed})`);
  console.log(`  ${player.id}: ${actionsToString(player.history)}`);
  console.log(`  ${opponent.id}: ${actionsToString(opponent.history)}`);

  for (const tracked of [player, opponent]) {
    const recorded = getRecordedHistory(tracked);
    if (recorded) {
      console.log(`  recorded by ${tracked.id}: ${actionsToString(recorded)}`);
    }
  }
} catch (error) {
  if (error instanceof TransformerConfigError || error instanceof UsageError) {
    console.error(error.message);
    printUsage();
    process.exit(1);
  }
  throw error;
}
