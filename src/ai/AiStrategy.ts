/**
 * AI strategies.
 *
 * A strategy picks one move from the ranked candidate list (best first).
 * Returning undefined means "no preference" and the engine takes the top
 * candidate. All strategies are pure.
 */

import type { StrategyName } from './DifficultyProfile';
import { LETHAL_SCORE, type ScoredMove } from './MoveEvaluator';

/** Card plays scoring within this many points of the best move count as close. */
export const CLOSE_SCORE_MARGIN = 3;

export interface AiStrategy {
  readonly name: StrategyName;
  select(ranked: readonly ScoredMove[]): ScoredMove | undefined;
}

function closeCardPlays(ranked: readonly ScoredMove[]): ScoredMove[] {
  if (ranked.length === 0) return [];
  const threshold = ranked[0].value - CLOSE_SCORE_MARGIN;
  return ranked.filter((m) => m.kind === 'play-card' && m.value >= threshold);
}

function cardCost(move: ScoredMove): number {
  return move.kind === 'play-card' ? move.card.cost : -1;
}

/** Go face whenever possible. */
export const AggressiveStrategy: AiStrategy = {
  name: 'aggressive',
  select(ranked) {
    return ranked.find((m) => m.kind === 'face-attack');
  },
};

/** Develop the board with the best-scoring close card play. */
export const ControlStrategy: AiStrategy = {
  name: 'control',
  select(ranked) {
    return closeCardPlays(ranked)[0];
  },
};

/** Spend mana: the most expensive close card play. */
export const TempoStrategy: AiStrategy = {
  name: 'tempo',
  select(ranked) {
    let best: ScoredMove | undefined;
    for (const move of closeCardPlays(ranked)) {
      if (best === undefined || cardCost(move) > cardCost(best)) {
        best = move;
      }
    }
    return best;
  },
};

/** Finish the game if possible, otherwise trade on the board. */
export const DefensiveStrategy: AiStrategy = {
  name: 'defensive',
  select(ranked) {
    const lethal = ranked.find(
      (m) => m.kind === 'face-attack' && m.value === LETHAL_SCORE,
    );
    return lethal ?? ranked.find((m) => m.kind === 'creature-attack');
  },
};

export const STRATEGIES: Readonly<Record<StrategyName, AiStrategy>> = {
  aggressive: AggressiveStrategy,
  control: ControlStrategy,
  tempo: TempoStrategy,
  defensive: DefensiveStrategy,
};
