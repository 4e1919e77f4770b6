/**
 * Match setup: one human seat against the AI.
 *
 * `startGame` validates both decks, seeds every random source from one
 * number, starts the match and hands back the AI engine for the second
 * seat. Invalid decks are reported as errors rather than thrown.
 */

import type { CardCatalog } from '../card-system/CardCatalog';
import { validateDeck, type DeckDefinition } from '../card-system/Deck';
import { findDeck, loadDeckFile } from '../card-system/dataFiles';
import type { Logger } from '../core-engine/Logger';
import { createSeededRng } from '../core-engine/Rng';
import type { RulesConfig } from '../core-engine/RulesConfig';
import { AiDecisionEngine } from '../ai/AiDecisionEngine';
import {
  DIFFICULTY_PROFILES,
  type AiDifficulty,
  type DifficultyProfile,
} from '../ai/DifficultyProfile';
import { Match } from './Match';

export const HUMAN_PLAYER_ID = 'player1';
export const AI_PLAYER_ID = 'player2';
export const DEFAULT_PLAYER_DECK_ID = 'starter';

/** Keeps the AI's rolls independent of the match's shuffles. */
const AI_SEED_OFFSET = 1;

export interface StartGameOptions {
  playerName: string;
  aiDifficulty: AiDifficulty;
  catalog: CardCatalog;
  /** Defaults to the 'starter' deck. */
  playerDeck?: DeckDefinition;
  /** Defaults to the difficulty profile's deck. */
  aiDeck?: DeckDefinition;
  seed: number;
  rules?: Partial<RulesConfig>;
  logger?: Logger;
  clock?: () => number;
  /** Defaults to "AI (<difficulty>)". */
  aiName?: string;
  /** Decks to take defaults from (defaults to the bundled starter decks). */
  decks?: readonly DeckDefinition[];
  /** Profile adjustments for the AI, e.g. `{ thinkingTimeMs: 0 }`. */
  aiOverrides?: Partial<Omit<DifficultyProfile, 'difficulty'>>;
}

export type StartGameResult =
  | { readonly ok: true; readonly match: Match; readonly ai: AiDecisionEngine }
  | { readonly ok: false; readonly errors: readonly string[] };

export function startGame(options: StartGameOptions): StartGameResult {
  const { playerName, aiDifficulty, catalog, seed, logger } = options;
  const profile = DIFFICULTY_PROFILES[aiDifficulty];

  const needsDefaults = options.playerDeck === undefined || options.aiDeck === undefined;
  const decks = options.decks ?? (needsDefaults ? loadDeckFile(catalog) : []);
  const playerDeck = options.playerDeck ?? findDeck(decks, DEFAULT_PLAYER_DECK_ID);
  const aiDeck = options.aiDeck ?? findDeck(decks, profile.deckId);

  const errors = [
    ...validateDeck(playerDeck).errors.map((e) => `Player deck: ${e}`),
    ...validateDeck(aiDeck).errors.map((e) => `AI deck: ${e}`),
  ];
  if (errors.length > 0) {
    logger?.warn(`Cannot start game: ${errors.length} deck error(s)`);
    return { ok: false, errors };
  }

  const match = new Match({
    players: [
      { id: HUMAN_PLAYER_ID, name: playerName, isAI: false, deck: playerDeck },
      {
        id: AI_PLAYER_ID,
        name: options.aiName ?? `AI (${aiDifficulty})`,
        isAI: true,
        deck: aiDeck,
      },
    ],
    rng: createSeededRng(seed),
    rules: options.rules,
    logger,
    clock: options.clock,
  });

  const ai = new AiDecisionEngine(AI_PLAYER_ID, {
    difficulty: aiDifficulty,
    overrides: options.aiOverrides,
    rng: createSeededRng(seed + AI_SEED_OFFSET),
    logger,
  });

  match.start();
  return { ok: true, match, ai };
}
