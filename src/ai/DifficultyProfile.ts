/**
 * Difficulty profiles for the AI opponent.
 */

export const AI_DIFFICULTIES = ['easy', 'medium', 'hard', 'expert'] as const;

export type AiDifficulty = (typeof AI_DIFFICULTIES)[number];

export const STRATEGY_NAMES = ['aggressive', 'control', 'tempo', 'defensive'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export interface DifficultyProfile {
  readonly difficulty: AiDifficulty;
  /** Minimum time a decision takes in `decideAfterThinking`. */
  readonly thinkingTimeMs: number;
  readonly strategy: StrategyName;
  /** Probability of picking a lower-ranked move, in [0, 1]. */
  readonly mistakeChance: number;
  /** Search depth hint; decisions are currently single-ply. */
  readonly lookAheadDepth: number;
  /** Starter deck the AI plays when none is given. */
  readonly deckId: string;
}

export const DIFFICULTY_PROFILES: Readonly<Record<AiDifficulty, DifficultyProfile>> = {
  easy: {
    difficulty: 'easy',
    thinkingTimeMs: 500,
    strategy: 'aggressive',
    mistakeChance: 0.3,
    lookAheadDepth: 1,
    deckId: 'ai-aggro',
  },
  medium: {
    difficulty: 'medium',
    thinkingTimeMs: 1000,
    strategy: 'tempo',
    mistakeChance: 0.15,
    lookAheadDepth: 2,
    deckId: 'ai-tempo',
  },
  hard: {
    difficulty: 'hard',
    thinkingTimeMs: 1500,
    strategy: 'control',
    mistakeChance: 0.05,
    lookAheadDepth: 3,
    deckId: 'ai-control',
  },
  expert: {
    difficulty: 'expert',
    thinkingTimeMs: 2000,
    strategy: 'control',
    mistakeChance: 0,
    lookAheadDepth: 4,
    deckId: 'ai-control',
  },
};

export function isAiDifficulty(value: string): value is AiDifficulty {
  return AI_DIFFICULTIES.some((d) => d === value);
}
