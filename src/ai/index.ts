/**
 * AI Module
 *
 * The computer opponent: move generation, scoring, strategies, the
 * decision engine and a headless turn driver.
 */

export type { AiDifficulty, DifficultyProfile, StrategyName } from './DifficultyProfile';
export {
  AI_DIFFICULTIES,
  STRATEGY_NAMES,
  DIFFICULTY_PROFILES,
  isAiDifficulty,
} from './DifficultyProfile';

export type { MoveOption, MoveKind } from './MoveGenerator';
export { generateMoves, defendersOf } from './MoveGenerator';

export type { ScoredMove } from './MoveEvaluator';
export { LETHAL_SCORE, scoreMove, evaluateMoves } from './MoveEvaluator';

export type { AiStrategy } from './AiStrategy';
export {
  CLOSE_SCORE_MARGIN,
  AggressiveStrategy,
  ControlStrategy,
  TempoStrategy,
  DefensiveStrategy,
  STRATEGIES,
} from './AiStrategy';

export type {
  AiDecision,
  DecisionRecord,
  AiStatistics,
  AiDecisionEngineOptions,
  ThinkOptions,
} from './AiDecisionEngine';
export { AiDecisionEngine, AbortError } from './AiDecisionEngine';

export type { AiTurnOptions, AiTurnResult } from './AiTurnDriver';
export { playAiTurn, playAiMulligan } from './AiTurnDriver';
