/**
 * AI-vs-AI helpers built on the bundled card set.
 */

import { loadCatalogFile, loadDeckFile } from '../../src/card-system/dataFiles';
import type { Logger } from '../../src/core-engine/Logger';
import { silentLogger } from '../../src/core-engine/Logger';
import { createSeededRng } from '../../src/core-engine/Rng';
import { AiDecisionEngine } from '../../src/ai/AiDecisionEngine';
import { playAiMulligan, playAiTurn } from '../../src/ai/AiTurnDriver';
import { HUMAN_PLAYER_ID, startGame } from '../../src/rule-engine/createMatch';
import type { Match } from '../../src/rule-engine/Match';

export const MAX_TURNS = 200;

export const bundled = (() => {
  const { catalog } = loadCatalogFile();
  return { catalog, decks: loadDeckFile(catalog) };
})();

export interface SimulatedGame {
  match: Match;
  ai: AiDecisionEngine;
  challenger: AiDecisionEngine;
}

/** A started match with an AI engine on each seat; nothing played yet. */
export function setUpSimulation(seed: number, logger: Logger = silentLogger): SimulatedGame {
  const started = startGame({
    playerName: 'Challenger',
    aiDifficulty: 'hard',
    catalog: bundled.catalog,
    decks: bundled.decks,
    seed,
    logger,
    clock: () => 0,
  });
  if (!started.ok) {
    throw new Error(`Bundled decks rejected: ${started.errors.join('; ')}`);
  }
  const challenger = new AiDecisionEngine(HUMAN_PLAYER_ID, {
    difficulty: 'medium',
    rng: createSeededRng(seed + 2),
    logger,
  });
  return { match: started.match, ai: started.ai, challenger };
}

/** Mulligan both seats, then alternate AI turns until the game ends. */
export function playOut(game: SimulatedGame, logger: Logger = silentLogger): void {
  const { match, ai, challenger } = game;
  playAiMulligan(match, challenger);
  playAiMulligan(match, ai);

  while (!match.isGameOver && match.turnNumber < MAX_TURNS) {
    const engine = match.getActivePlayer().id === ai.playerId ? ai : challenger;
    playAiTurn(match, engine, { logger });
  }
}
