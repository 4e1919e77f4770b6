/**
 * Match transcripts: record a game as its setup plus the accepted intents,
 * and replay it.
 *
 * Because every random source in a match derives from the seed, replaying
 * the same intents against the same seed, catalog and decks rebuilds the
 * same game event for event.
 *
 * Usage:
 *   const recorder = new MatchTranscriptRecorder(match, { seed, aiDifficulty, deckIds });
 *   // ... play ...
 *   const transcript = recorder.finalize();
 *   const again = replayTranscript(transcript, catalog, decks);
 */

import { z } from 'zod';
import type { CardCatalog } from '../card-system/CardCatalog';
import type { DeckDefinition } from '../card-system/Deck';
import { findDeck } from '../card-system/dataFiles';
import {
  isEventOfType,
  type GameEventRecord,
  type WinReason,
} from '../core-engine/GameEventEmitter';
import type { Logger } from '../core-engine/Logger';
import { rulesConfigSchema, type RulesConfig } from '../core-engine/RulesConfig';
import { AI_DIFFICULTIES, type AiDifficulty } from '../ai/DifficultyProfile';
import { startGame } from './createMatch';
import type { Intent } from './Intents';
import type { Match } from './Match';

// ── Transcript types ────────────────────────────────────────

export interface TranscriptPlayer {
  id: string;
  name: string;
  isAI: boolean;
  deckId: string;
}

export interface TranscriptEntry {
  playerId: string;
  intent: Intent;
}

export interface TranscriptResult {
  winnerId: string;
  reason: WinReason;
  turnNumber: number;
}

/** A complete match transcript. */
export interface MatchTranscript {
  /** Format version for future compatibility. */
  version: 1;
  metadata: {
    /** ISO 8601 timestamp of recorder creation. */
    startedAt: string;
    /** ISO 8601 timestamp of finalize. */
    endedAt: string;
    seed: number;
    aiDifficulty: AiDifficulty;
    players: TranscriptPlayer[];
    rules: RulesConfig;
  };
  /** Accepted intents in submission order. */
  intents: TranscriptEntry[];
  /** Set on finalize when the match is over. */
  result: TranscriptResult | null;
}

// ── Schema ──────────────────────────────────────────────────

const entityRefSchema = z.union([
  z.object({ kind: z.literal('hero'), playerId: z.string() }),
  z.object({ kind: z.literal('creature'), instanceId: z.string() }),
]);

const intentSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('play-card'),
    cardId: z.string(),
    target: entityRefSchema.optional(),
    position: z.number().int().optional(),
  }),
  z.object({
    type: z.literal('attack'),
    attackerId: z.string(),
    target: z.union([
      z.object({ kind: z.literal('face') }),
      z.object({ kind: z.literal('creature'), instanceId: z.string() }),
    ]),
  }),
  z.object({ type: z.literal('end-turn') }),
  z.object({ type: z.literal('concede') }),
  z.object({ type: z.literal('mulligan'), replace: z.array(z.number().int()) }),
]);

export const matchTranscriptSchema = z.object({
  version: z.literal(1),
  metadata: z.object({
    startedAt: z.string(),
    endedAt: z.string(),
    seed: z.number().int(),
    aiDifficulty: z.enum(AI_DIFFICULTIES),
    players: z
      .array(
        z.object({
          id: z.string(),
          name: z.string(),
          isAI: z.boolean(),
          deckId: z.string(),
        }),
      )
      .length(2),
    rules: rulesConfigSchema,
  }),
  intents: z.array(z.object({ playerId: z.string(), intent: intentSchema })),
  result: z
    .object({
      winnerId: z.string(),
      reason: z.enum(['opponent-defeated', 'concede']),
      turnNumber: z.number().int(),
    })
    .nullable(),
});

/**
 * Validate parsed JSON as a transcript.
 *
 * @throws ZodError if the shape is wrong.
 */
export function parseTranscript(raw: unknown): MatchTranscript {
  return matchTranscriptSchema.parse(raw);
}

// ── Recorder ────────────────────────────────────────────────

export interface TranscriptSetup {
  seed: number;
  aiDifficulty: AiDifficulty;
  /** Deck ids by seat. */
  deckIds: readonly [string, string];
}

/**
 * Records every intent the match accepts from the moment it is attached.
 * Attach right after `startGame` so the mulligans are captured.
 */
export class MatchTranscriptRecorder {
  private readonly transcript: MatchTranscript;
  private readonly match: Match;
  private readonly unsubscribe: () => void;

  constructor(match: Match, setup: TranscriptSetup) {
    this.match = match;
    this.transcript = {
      version: 1,
      metadata: {
        startedAt: new Date().toISOString(),
        endedAt: '',
        seed: setup.seed,
        aiDifficulty: setup.aiDifficulty,
        players: match.players.map((p, i) => ({
          id: p.id,
          name: p.name,
          isAI: p.isAI,
          deckId: setup.deckIds[i],
        })),
        rules: { ...match.rules },
      },
      intents: [],
      result: null,
    };

    this.unsubscribe = match.onIntent((playerId, intent) => {
      this.transcript.intents.push({ playerId, intent });
    });
  }

  get intentCount(): number {
    return this.transcript.intents.length;
  }

  /** Stop recording and return the transcript. */
  finalize(): MatchTranscript {
    this.unsubscribe();
    this.transcript.metadata.endedAt = new Date().toISOString();
    const { winnerId, winReason } = this.match;
    this.transcript.result =
      winnerId !== null && winReason !== null
        ? { winnerId, reason: winReason, turnNumber: this.match.turnNumber }
        : null;
    return this.transcript;
  }
}

// ── Replay ──────────────────────────────────────────────────

export interface ReplayOptions {
  logger?: Logger;
  clock?: () => number;
}

/**
 * Rebuild a match from a transcript by re-submitting its intents.
 *
 * @throws If the decks are invalid or any recorded intent is rejected.
 */
export function replayTranscript(
  transcript: MatchTranscript,
  catalog: CardCatalog,
  decks: readonly DeckDefinition[],
  options: ReplayOptions = {},
): Match {
  const { seed, aiDifficulty, players, rules } = transcript.metadata;
  const [human, ai] = players;

  const started = startGame({
    playerName: human.name,
    aiName: ai.name,
    aiDifficulty,
    catalog,
    playerDeck: findDeck(decks, human.deckId),
    aiDeck: findDeck(decks, ai.deckId),
    seed,
    rules,
    logger: options.logger,
    clock: options.clock,
  });
  if (!started.ok) {
    throw new Error(`Cannot replay transcript: ${started.errors.join('; ')}`);
  }

  transcript.intents.forEach(({ playerId, intent }, index) => {
    const result = started.match.submit(playerId, intent);
    if (!result.ok) {
      throw new Error(
        `Transcript intent #${index} (${intent.type} by ${playerId}) was rejected: ${result.message}`,
      );
    }
  });

  return started.match;
}

// ── Summary ─────────────────────────────────────────────────

export interface TurnSummary {
  turn: number;
  playerId: string;
  cardsPlayed: number;
  attacks: number;
  /** Damage dealt to heroes and creatures during the turn. */
  damageDealt: number;
}

/** Per-turn activity counts from a match history. */
export function summarizeTurns(history: readonly GameEventRecord[]): TurnSummary[] {
  const turns: TurnSummary[] = [];
  let current: TurnSummary | undefined;

  for (const record of history) {
    if (isEventOfType(record, 'turn-started')) {
      current = {
        turn: record.payload.turnNumber,
        playerId: record.payload.playerId,
        cardsPlayed: 0,
        attacks: 0,
        damageDealt: 0,
      };
      turns.push(current);
    } else if (current === undefined) {
      continue;
    } else if (record.type === 'card-played') {
      current.cardsPlayed++;
    } else if (record.type === 'attack') {
      current.attacks++;
    } else if (isEventOfType(record, 'damage')) {
      current.damageDealt += record.payload.amount;
    }
  }
  return turns;
}
