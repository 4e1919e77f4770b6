#!/usr/bin/env node
/**
 * Simulate an AI-vs-AI match and write its transcript.
 *
 * Both seats are driven by the decision engine; the run is fully
 * determined by the seed, so the transcript replays exactly.
 *
 * Usage:
 *   npx tsx scripts/simulate-match.ts [--seed 42] [--difficulty hard]
 *     [--challenger easy] [--out data/transcripts/simulated-match.json]
 *
 * Set LOG_LEVEL=debug to log every decision.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { parseArgs } from 'util';
import { findDeck, loadCatalogFile, loadDeckFile } from '../src/card-system';
import { createLogger, createSeededRng, parseLogLevel } from '../src/core-engine';
import {
  MatchTranscriptRecorder,
  HUMAN_PLAYER_ID,
  startGame,
} from '../src/rule-engine';
import {
  AiDecisionEngine,
  DIFFICULTY_PROFILES,
  isAiDifficulty,
  playAiMulligan,
  playAiTurn,
  type AiDifficulty,
} from '../src/ai';

const MAX_TURNS = 200;
/** Offset from the match seed for the challenger's rolls. */
const CHALLENGER_SEED_OFFSET = 2;

const logger = createLogger({
  tag: 'Simulate',
  level: parseLogLevel(process.env.LOG_LEVEL, 'info'),
});

const { values } = parseArgs({
  options: {
    seed: { type: 'string' },
    difficulty: { type: 'string' },
    challenger: { type: 'string' },
    out: { type: 'string' },
  },
});

const seedArg = values.seed ?? '42';
const outArg = values.out ?? 'data/transcripts/simulated-match.json';

function difficultyArg(name: string, value: string): AiDifficulty {
  if (!isAiDifficulty(value)) {
    logger.error(`--${name} must be one of easy, medium, hard, expert (got "${value}")`);
    process.exit(1);
  }
  return value;
}

const seed = Number.parseInt(seedArg, 10);
if (!Number.isInteger(seed)) {
  logger.error(`--seed must be an integer (got "${seedArg}")`);
  process.exit(1);
}
const aiDifficulty = difficultyArg('difficulty', values.difficulty ?? 'hard');
const challengerDifficulty = difficultyArg('challenger', values.challenger ?? 'medium');

const { catalog, rejected } = loadCatalogFile(undefined, logger);
if (rejected.length > 0) {
  logger.warn(`${rejected.length} card(s) were rejected from the card set`);
}
const decks = loadDeckFile(catalog);
const playerDeck = findDeck(decks, DIFFICULTY_PROFILES[challengerDifficulty].deckId);
const aiDeck = findDeck(decks, DIFFICULTY_PROFILES[aiDifficulty].deckId);

const started = startGame({
  playerName: `Challenger (${challengerDifficulty})`,
  aiDifficulty,
  catalog,
  decks,
  playerDeck,
  aiDeck,
  seed,
  logger,
});
if (!started.ok) {
  logger.error(`Could not start the match:\n  ${started.errors.join('\n  ')}`);
  process.exit(1);
}

const { match, ai } = started;
const challenger = new AiDecisionEngine(HUMAN_PLAYER_ID, {
  difficulty: challengerDifficulty,
  rng: createSeededRng(seed + CHALLENGER_SEED_OFFSET),
  logger,
});
const recorder = new MatchTranscriptRecorder(match, {
  seed,
  aiDifficulty,
  deckIds: [playerDeck.id, aiDeck.id],
});

playAiMulligan(match, challenger);
playAiMulligan(match, ai);

while (!match.isGameOver && match.turnNumber < MAX_TURNS) {
  const engine = match.getActivePlayer().id === ai.playerId ? ai : challenger;
  playAiTurn(match, engine, { logger });
}

if (!match.isGameOver) {
  logger.error(`Match did not end after ${MAX_TURNS} turns`);
  process.exit(1);
}

const transcript = recorder.finalize();

const outPath = resolve(outArg);
mkdirSync(dirname(outPath), { recursive: true });
writeFileSync(outPath, JSON.stringify(transcript, null, 2) + '\n');

const winner = match.winner;
logger.info(`Transcript written to ${outPath}`);
logger.info(`  Turns: ${match.turnNumber}, intents: ${transcript.intents.length}`);
logger.info(`  Winner: ${winner?.name ?? 'none'} (${match.winReason ?? 'n/a'})`);
for (const engine of [challenger, ai]) {
  const stats = engine.statistics();
  logger.info(
    `  ${engine.playerId}: ${stats.decisions} decisions, ${stats.mistakes} mistakes, ` +
      `average value ${stats.averageValue.toFixed(2)}`,
  );
}
