/**
 * Read-only, plain-data view of a match.
 *
 * The AI decides against a snapshot and never touches live state. Cards
 * are shared by reference since catalog entries are frozen.
 */

import type { Card, Keyword } from '../card-system/Card';
import type { GamePhase } from '../core-engine/GameState';
import type { WinReason } from '../core-engine/GameEventEmitter';
import type { RulesConfig } from '../core-engine/RulesConfig';
import type { CreatureInstance, CreatureState } from './CreatureInstance';
import type { PlayerState } from './PlayerState';

export interface CreatureSnapshot {
  readonly instanceId: string;
  readonly cardId: string;
  readonly name: string;
  readonly ownerId: string;
  readonly attack: number;
  readonly health: number;
  readonly maxHealth: number;
  readonly keywords: readonly Keyword[];
  readonly state: CreatureState;
  readonly frozen: boolean;
  readonly silenced: boolean;
  readonly canAttack: boolean;
  readonly timesAttackedThisTurn: number;
}

export interface WeaponSnapshot {
  readonly cardId: string;
  readonly name: string;
  readonly attack: number;
  readonly durability: number;
}

export interface PlayerSnapshot {
  readonly id: string;
  readonly name: string;
  readonly isAI: boolean;
  readonly health: number;
  readonly maxHealth: number;
  readonly mana: number;
  readonly maxMana: number;
  readonly hand: readonly Card[];
  readonly drawPileSize: number;
  readonly battlefield: readonly CreatureSnapshot[];
  readonly weapon: WeaponSnapshot | null;
  readonly fatigue: number;
}

export interface MatchSnapshot {
  readonly turnNumber: number;
  readonly phase: GamePhase;
  readonly currentPlayerIndex: number;
  readonly activePlayerId: string;
  readonly players: readonly [PlayerSnapshot, PlayerSnapshot];
  readonly winnerId: string | null;
  readonly winReason: WinReason | null;
  /** Number of events in the match history when the snapshot was taken. */
  readonly historyLength: number;
  readonly rules: RulesConfig;
}

export function snapshotCreature(creature: CreatureInstance): CreatureSnapshot {
  return {
    instanceId: creature.instanceId,
    cardId: creature.cardId,
    name: creature.name,
    ownerId: creature.ownerId,
    attack: creature.attack,
    health: creature.health,
    maxHealth: creature.maxHealth,
    keywords: [...creature.keywords],
    state: creature.state,
    frozen: creature.frozen,
    silenced: creature.silenced,
    canAttack: creature.canAttack(),
    timesAttackedThisTurn: creature.timesAttackedThisTurn,
  };
}

export function snapshotPlayer(player: PlayerState): PlayerSnapshot {
  return {
    id: player.id,
    name: player.name,
    isAI: player.isAI,
    health: player.health,
    maxHealth: player.maxHealth,
    mana: player.mana,
    maxMana: player.maxMana,
    hand: [...player.hand],
    drawPileSize: player.drawPile.size(),
    battlefield: player.battlefield.map(snapshotCreature),
    weapon: player.weapon
      ? {
          cardId: player.weapon.card.id,
          name: player.weapon.card.name,
          attack: player.weapon.attack,
          durability: player.weapon.durability,
        }
      : null,
    fatigue: player.fatigue,
  };
}

/** Find a player snapshot by id. */
export function playerInSnapshot(
  snapshot: MatchSnapshot,
  playerId: string,
): PlayerSnapshot | undefined {
  return snapshot.players.find((p) => p.id === playerId);
}

/** The snapshot of the other seat. */
export function opponentInSnapshot(
  snapshot: MatchSnapshot,
  playerId: string,
): PlayerSnapshot | undefined {
  return snapshot.players.find((p) => p.id !== playerId);
}
