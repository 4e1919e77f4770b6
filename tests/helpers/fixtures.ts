/**
 * Shared builders for engine tests: small cards, legal decks and matches
 * whose hands and boards the test arranges directly.
 */

import {
  createCreatureCard,
  createSpellCard,
  type AbilityDefinition,
  type Card,
  type CreatureCard,
  type EffectDefinition,
  type Keyword,
  type SpellCard,
} from '../../src/card-system/Card';
import type { DeckDefinition } from '../../src/card-system/Deck';
import { silentLogger, type Logger } from '../../src/core-engine/Logger';
import type { RulesConfig } from '../../src/core-engine/RulesConfig';
import { CreatureInstance } from '../../src/rule-engine/CreatureInstance';
import { Match } from '../../src/rule-engine/Match';
import type { PlayerState } from '../../src/rule-engine/PlayerState';

/** Deterministic LCG in [0, 1). */
export function createTestRng(seed = 42): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/** Replays the given values in order, then repeats the last one. */
export function sequenceRng(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    const value = values[Math.min(i, values.length - 1)];
    i++;
    return value;
  };
}

export interface TestCreatureOptions {
  cost?: number;
  keywords?: readonly Keyword[];
  abilities?: readonly AbilityDefinition[];
}

/** A creature whose name equals its id. */
export function testCreature(
  id: string,
  attack: number,
  health: number,
  options: TestCreatureOptions = {},
): CreatureCard {
  return createCreatureCard({
    id,
    name: id,
    cost: options.cost ?? 1,
    attack,
    health,
    keywords: options.keywords,
    abilities: options.abilities,
  });
}

/** A spell with a single cast ability. */
export function testSpell(
  id: string,
  effects: readonly EffectDefinition[],
  cost = 0,
): SpellCard {
  return createSpellCard({
    id,
    name: id,
    cost,
    abilities: [{ id: `${id}_cast`, name: id, trigger: 'cast', effects }],
  });
}

/** Fifteen distinct 1-mana 1/1 creatures. */
export function fillerCards(prefix = 'filler'): CreatureCard[] {
  return Array.from({ length: 15 }, (_, i) => testCreature(`${prefix}_${i + 1}`, 1, 1));
}

/** Two copies of each card; pass 15 distinct cards for a legal deck. */
export function deckOf(id: string, cards: readonly Card[]): DeckDefinition {
  return {
    id,
    name: id,
    heroClass: 'neutral',
    entries: cards.map((card) => ({ card, count: 2 })),
  };
}

export function fillerDeck(id = 'filler-deck'): DeckDefinition {
  return deckOf(id, fillerCards());
}

/** Fifteen distinct 0-cost spells that each deal 10 to the enemy hero. */
export function blastDeck(id = 'blast-deck'): DeckDefinition {
  return deckOf(
    id,
    Array.from({ length: 15 }, (_, i) =>
      testSpell(`blast_${i + 1}`, [{ type: 'damage', value: 10, target: 'enemy-hero' }]),
    ),
  );
}

export interface TestMatchOptions {
  decks?: readonly [DeckDefinition, DeckDefinition];
  rules?: Partial<RulesConfig>;
  logger?: Logger;
  rng?: () => number;
}

/**
 * A match between "alice" (seat 0) and "bob" (seat 1). Mulligans are
 * skipped unless the rules say otherwise. Not started.
 */
export function createTestMatch(options: TestMatchOptions = {}): Match {
  const [aliceDeck, bobDeck] = options.decks ?? [fillerDeck('alice-deck'), fillerDeck('bob-deck')];
  return new Match({
    players: [
      { id: 'alice', name: 'Alice', deck: aliceDeck },
      { id: 'bob', name: 'Bob', isAI: true, deck: bobDeck },
    ],
    rng: options.rng ?? createTestRng(),
    rules: { skipMulligan: true, ...options.rules },
    logger: options.logger ?? silentLogger,
    clock: () => 0,
  });
}

/** A started match in alice's first main phase. */
export function startedMatch(options: TestMatchOptions = {}): Match {
  const match = createTestMatch(options);
  match.start();
  return match;
}

/** Look up a player that the test knows exists. */
export function playerOf(match: Match, playerId: string): PlayerState {
  const player = match.getPlayer(playerId);
  if (player === undefined) {
    throw new Error(`No player "${playerId}" in test match`);
  }
  return player;
}

/**
 * Put a creature straight onto a player's battlefield. A ready creature
 * may attack this turn.
 */
export function placeCreature(
  player: PlayerState,
  card: CreatureCard,
  instanceId: string,
  ready = true,
): CreatureInstance {
  const creature = new CreatureInstance(card, instanceId, player.id);
  if (ready) creature.startTurn();
  player.addToBattlefield(creature);
  return creature;
}

/** Put a card in hand and top up mana to at least its cost. */
export function giveCard(player: PlayerState, card: Card): void {
  player.addToHand(card);
  if (player.mana < card.cost) setMana(player, card.cost);
}

/** Replace the whole hand. */
export function setHand(player: PlayerState, cards: readonly Card[]): void {
  while (player.hand.length > 0) {
    player.removeFromHand(player.hand[0].id);
  }
  for (const card of cards) player.addToHand(card);
}

/** Move hero health to `health` through damage or healing. */
export function setHealth(player: PlayerState, health: number): void {
  if (health < player.health) player.takeDamage(player.health - health);
  else player.heal(health - player.health);
}

/** Move current mana to `mana` by spending or gaining it. */
export function setMana(player: PlayerState, mana: number): void {
  if (mana < player.mana) player.spendMana(player.mana - mana);
  else player.gainMana(mana - player.mana);
}

/** Event types in history order. */
export function eventTypes(match: Match): string[] {
  return match.history.map((e) => e.type);
}
