/**
 * Candidate move generation for the AI.
 *
 * Works purely on a MatchSnapshot and applies the same legality rules the
 * Match enforces, so every candidate is a legal intent at snapshot time.
 */

import type { Card } from '../card-system/Card';
import {
  legalAttackTargets,
  type AttackIntent,
  type DefenderInfo,
  type EndTurnIntent,
  type PlayCardIntent,
} from '../rule-engine/Intents';
import {
  opponentInSnapshot,
  playerInSnapshot,
  type CreatureSnapshot,
  type MatchSnapshot,
  type PlayerSnapshot,
} from '../rule-engine/MatchSnapshot';

export type MoveOption =
  | { readonly kind: 'play-card'; readonly intent: PlayCardIntent; readonly card: Card }
  | {
      readonly kind: 'face-attack';
      readonly intent: AttackIntent;
      readonly attacker: CreatureSnapshot;
    }
  | {
      readonly kind: 'creature-attack';
      readonly intent: AttackIntent;
      readonly attacker: CreatureSnapshot;
      readonly defender: CreatureSnapshot;
    }
  | { readonly kind: 'end-turn'; readonly intent: EndTurnIntent };

export type MoveKind = MoveOption['kind'];

export function defendersOf(player: PlayerSnapshot): DefenderInfo[] {
  return player.battlefield.map((c) => ({
    instanceId: c.instanceId,
    taunt: c.keywords.includes('taunt'),
    stealth: c.keywords.includes('stealth'),
  }));
}

/**
 * Every legal move for `playerId`. Spells are offered untargeted; one play
 * per distinct card id; `end-turn` is always last.
 *
 * @throws If the player is not in the snapshot.
 */
export function generateMoves(snapshot: MatchSnapshot, playerId: string): MoveOption[] {
  const me = playerInSnapshot(snapshot, playerId);
  const opponent = opponentInSnapshot(snapshot, playerId);
  if (me === undefined || opponent === undefined) {
    throw new Error(`Player "${playerId}" is not part of this match`);
  }

  const moves: MoveOption[] = [];

  const offered = new Set<string>();
  for (const card of me.hand) {
    if (card.cost > me.mana || offered.has(card.id)) continue;
    if (card.type === 'creature' && me.battlefield.length >= snapshot.rules.battlefieldLimit) {
      continue;
    }
    offered.add(card.id);
    moves.push({ kind: 'play-card', intent: { type: 'play-card', cardId: card.id }, card });
  }

  const legal = legalAttackTargets(defendersOf(opponent));
  for (const attacker of me.battlefield) {
    if (!attacker.canAttack) continue;

    if (legal.faceAllowed) {
      moves.push({
        kind: 'face-attack',
        intent: { type: 'attack', attackerId: attacker.instanceId, target: { kind: 'face' } },
        attacker,
      });
    }
    for (const defender of opponent.battlefield) {
      if (!legal.creatureIds.includes(defender.instanceId)) continue;
      moves.push({
        kind: 'creature-attack',
        intent: {
          type: 'attack',
          attackerId: attacker.instanceId,
          target: { kind: 'creature', instanceId: defender.instanceId },
        },
        attacker,
        defender,
      });
    }
  }

  moves.push({ kind: 'end-turn', intent: { type: 'end-turn' } });
  return moves;
}
