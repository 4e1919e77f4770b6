/**
 * The AI opponent's decision engine.
 *
 * Each call to `decide` generates every legal move from a snapshot, scores
 * and ranks them, lets the profile's strategy pick one and, with the
 * profile's mistake chance, swaps in a slightly worse move. The engine never
 * touches the Match; the driver submits the returned intent.
 */

import type { Card } from '../card-system/Card';
import { createLogger, type Logger } from '../core-engine/Logger';
import type { Rng } from '../core-engine/Rng';
import type { Intent } from '../rule-engine/Intents';
import { opponentInSnapshot, type MatchSnapshot } from '../rule-engine/MatchSnapshot';
import { STRATEGIES } from './AiStrategy';
import {
  DIFFICULTY_PROFILES,
  type AiDifficulty,
  type DifficultyProfile,
} from './DifficultyProfile';
import { evaluateMoves, type ScoredMove } from './MoveEvaluator';
import { generateMoves, type MoveKind } from './MoveGenerator';

// ── Types ───────────────────────────────────────────────────

export interface AiDecision {
  readonly intent: Intent;
  readonly value: number;
  readonly reasoning: string;
  readonly kind: MoveKind;
  /** Whether the mistake roll replaced the strategy's pick. */
  readonly mistake: boolean;
}

export interface DecisionRecord {
  /** `turn_player_historyLength` of the snapshot decided on. */
  readonly key: string;
  readonly turnNumber: number;
  readonly decision: AiDecision;
  readonly candidateCount: number;
}

export interface AiStatistics {
  readonly difficulty: AiDifficulty;
  readonly strategy: DifficultyProfile['strategy'];
  readonly decisions: number;
  readonly mistakes: number;
  readonly averageValue: number;
  readonly byKind: Readonly<Record<MoveKind, number>>;
}

export interface AiDecisionEngineOptions {
  /** Defaults to 'medium'. */
  difficulty?: AiDifficulty;
  /** Adjust individual profile fields (e.g. `{ thinkingTimeMs: 0 }`). */
  overrides?: Partial<Omit<DifficultyProfile, 'difficulty'>>;
  rng?: Rng;
  logger?: Logger;
  /** Decisions kept in `history` (defaults to 50). */
  historyLimit?: number;
  /** Millisecond clock used to measure thinking time. */
  now?: () => number;
}

export interface ThinkOptions {
  signal?: AbortSignal;
}

/** Rejection reason when thinking is cancelled. */
export class AbortError extends Error {
  constructor(message = 'AI decision was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/** Highest 1-based rank a mistake can fall to. */
const WORST_MISTAKE_RANK = 4;

const MULLIGAN_COST_THRESHOLD = 4;

// ── Engine ──────────────────────────────────────────────────

export class AiDecisionEngine {
  readonly playerId: string;
  readonly profile: DifficultyProfile;

  private readonly rng: Rng;
  private readonly logger: Logger;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly records: DecisionRecord[] = [];
  private totalDecisions = 0;
  private totalMistakes = 0;
  private valueSum = 0;
  private readonly kindCounts: Record<MoveKind, number> = {
    'play-card': 0,
    'face-attack': 0,
    'creature-attack': 0,
    'end-turn': 0,
  };

  constructor(playerId: string, options: AiDecisionEngineOptions = {}) {
    const {
      difficulty = 'medium',
      overrides = {},
      rng = Math.random,
      historyLimit = 50,
      now = Date.now,
    } = options;

    this.playerId = playerId;
    this.profile = { ...DIFFICULTY_PROFILES[difficulty], ...overrides, difficulty };
    this.rng = rng;
    this.historyLimit = historyLimit;
    this.now = now;
    this.logger = options.logger?.child('AI') ?? createLogger({ tag: 'AI' });
  }

  /**
   * Pick one legal intent for this engine's player.
   *
   * @throws If it is not this player's main phase in the snapshot.
   */
  decide(snapshot: MatchSnapshot): AiDecision {
    if (snapshot.phase !== 'main' || snapshot.activePlayerId !== this.playerId) {
      throw new Error(
        `AI ${this.playerId} cannot act: phase "${snapshot.phase}", active player ${snapshot.activePlayerId}`,
      );
    }
    const opponent = opponentInSnapshot(snapshot, this.playerId);
    if (opponent === undefined) {
      throw new Error(`Player "${this.playerId}" is not part of this match`);
    }

    const ranked = evaluateMoves(generateMoves(snapshot, this.playerId), opponent);
    let choice: ScoredMove =
      STRATEGIES[this.profile.strategy].select(ranked) ?? ranked[0];
    let mistake = false;

    if (ranked.length > 1 && this.rng() < this.profile.mistakeChance) {
      const rank = Math.min(
        2 + Math.floor(this.rng() * (WORST_MISTAKE_RANK - 1)),
        ranked.length,
      );
      choice = ranked[rank - 1];
      mistake = true;
    }

    const decision: AiDecision = {
      intent: choice.intent,
      value: choice.value,
      reasoning: mistake ? `${choice.reasoning} (AI mistake)` : choice.reasoning,
      kind: choice.kind,
      mistake,
    };
    this.remember(snapshot, decision, ranked.length);
    this.logger.debug(`${this.playerId}: ${decision.reasoning} [${decision.value}]`);
    return decision;
  }

  /**
   * Decide, then wait out the rest of the profile's thinking time.
   * Rejects with AbortError when the signal fires first.
   */
  async decideAfterThinking(
    snapshot: MatchSnapshot,
    options: ThinkOptions = {},
  ): Promise<AiDecision> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new AbortError();
    }

    const started = this.now();
    const decision = this.decide(snapshot);
    const remaining = Math.max(0, this.profile.thinkingTimeMs - (this.now() - started));
    await sleep(remaining, signal);
    return decision;
  }

  /** Hand positions to replace: expensive cards and 0-cost non-creatures. */
  chooseMulligan(hand: readonly Card[]): number[] {
    const replace: number[] = [];
    hand.forEach((card, index) => {
      if (
        card.cost > MULLIGAN_COST_THRESHOLD ||
        (card.cost === 0 && card.type !== 'creature')
      ) {
        replace.push(index);
      }
    });
    return replace;
  }

  /** Most recent decisions, oldest first. */
  get history(): readonly DecisionRecord[] {
    return this.records;
  }

  decisionFor(key: string): DecisionRecord | undefined {
    return this.records.find((r) => r.key === key);
  }

  statistics(): AiStatistics {
    return {
      difficulty: this.profile.difficulty,
      strategy: this.profile.strategy,
      decisions: this.totalDecisions,
      mistakes: this.totalMistakes,
      averageValue: this.totalDecisions === 0 ? 0 : this.valueSum / this.totalDecisions,
      byKind: { ...this.kindCounts },
    };
  }

  clearHistory(): void {
    this.records.length = 0;
  }

  private remember(
    snapshot: MatchSnapshot,
    decision: AiDecision,
    candidateCount: number,
  ): void {
    this.records.push({
      key: `${snapshot.turnNumber}_${this.playerId}_${snapshot.historyLength}`,
      turnNumber: snapshot.turnNumber,
      decision,
      candidateCount,
    });
    if (this.records.length > this.historyLimit) {
      this.records.splice(0, this.records.length - this.historyLimit);
    }

    this.totalDecisions++;
    if (decision.mistake) this.totalMistakes++;
    this.valueSum += decision.value;
    this.kindCounts[decision.kind]++;
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
