/**
 * Scores candidate moves with simple board heuristics.
 */

import type { PlayerSnapshot } from '../rule-engine/MatchSnapshot';
import type { MoveOption } from './MoveGenerator';

/** Score of a face attack that kills the opposing hero. */
export const LETHAL_SCORE = 100;

export type ScoredMove = MoveOption & {
  readonly value: number;
  readonly reasoning: string;
};

export function scoreMove(
  move: MoveOption,
  opponent: PlayerSnapshot,
): { value: number; reasoning: string } {
  switch (move.kind) {
    case 'play-card': {
      const { card } = move;
      switch (card.type) {
        case 'creature': {
          let value = card.attack + card.health - card.cost;
          if (card.keywords.includes('taunt')) value += 2;
          if (card.keywords.includes('charge')) value += 1;
          return { value, reasoning: `Summon ${card.name}` };
        }
        case 'spell': {
          const targeted = move.intent.target !== undefined;
          return {
            value: 10 - card.cost + (targeted ? 2 : 0),
            reasoning: `Cast ${card.name}`,
          };
        }
        case 'weapon':
          return {
            value: card.attack * card.durability - card.cost,
            reasoning: `Equip ${card.name}`,
          };
      }
    }
    case 'face-attack': {
      const { attacker } = move;
      if (attacker.attack >= opponent.health) {
        return { value: LETHAL_SCORE, reasoning: `Lethal: ${attacker.name} attacks face` };
      }
      return { value: attacker.attack * 2, reasoning: `${attacker.name} attacks face` };
    }
    case 'creature-attack': {
      const { attacker, defender } = move;
      let value = 0;
      if (attacker.attack >= defender.health) {
        value += defender.health + 5;
      }
      if (defender.attack >= attacker.health) {
        value -= attacker.attack + attacker.health;
      }
      return { value, reasoning: `${attacker.name} attacks ${defender.name}` };
    }
    case 'end-turn':
      return { value: 0, reasoning: 'End turn' };
  }
}

/** Score every option and sort best first; equal scores keep their order. */
export function evaluateMoves(
  options: readonly MoveOption[],
  opponent: PlayerSnapshot,
): ScoredMove[] {
  return options
    .map((option) => ({ ...option, ...scoreMove(option, opponent) }))
    .sort((a, b) => b.value - a.value);
}
