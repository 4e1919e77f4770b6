/**
 * Plain snapshot values for AI tests that score moves without a match.
 */

import type { Card } from '../../src/card-system/Card';
import type { ScoredMove } from '../../src/ai/MoveEvaluator';
import type { CreatureSnapshot } from '../../src/rule-engine/MatchSnapshot';

export function creatureSnapshot(
  instanceId: string,
  attack: number,
  health: number,
  overrides: Partial<CreatureSnapshot> = {},
): CreatureSnapshot {
  return {
    instanceId,
    cardId: instanceId,
    name: instanceId,
    ownerId: 'alice',
    attack,
    health,
    maxHealth: health,
    keywords: [],
    state: 'ready',
    frozen: false,
    silenced: false,
    canAttack: true,
    timesAttackedThisTurn: 0,
    ...overrides,
  };
}

export function scoredPlay(card: Card, value: number): ScoredMove {
  return {
    kind: 'play-card',
    intent: { type: 'play-card', cardId: card.id },
    card,
    value,
    reasoning: `Play ${card.id}`,
  };
}

export function scoredFace(attacker: CreatureSnapshot, value: number): ScoredMove {
  return {
    kind: 'face-attack',
    intent: { type: 'attack', attackerId: attacker.instanceId, target: { kind: 'face' } },
    attacker,
    value,
    reasoning: `${attacker.name} attacks face`,
  };
}

export function scoredTrade(
  attacker: CreatureSnapshot,
  defender: CreatureSnapshot,
  value: number,
): ScoredMove {
  return {
    kind: 'creature-attack',
    intent: {
      type: 'attack',
      attackerId: attacker.instanceId,
      target: { kind: 'creature', instanceId: defender.instanceId },
    },
    attacker,
    defender,
    value,
    reasoning: `${attacker.name} attacks ${defender.name}`,
  };
}

export const scoredEndTurn: ScoredMove = {
  kind: 'end-turn',
  intent: { type: 'end-turn' },
  value: 0,
  reasoning: 'End turn',
};
