/**
 * Per-player state of a match: hero health, mana, hand, draw pile,
 * battlefield and weapon.
 *
 * Every operation is total. Rule violations return false (or a result
 * object) and leave the state unchanged; the Match turns them into intent
 * rejections.
 */

import type { Card, WeaponCard } from '../card-system/Card';
import { Pile } from '../card-system/Pile';
import type { Rng } from '../core-engine/Rng';
import { DEFAULT_RULES, type RulesConfig } from '../core-engine/RulesConfig';
import type { CreatureInstance } from './CreatureInstance';

export type DrawResult =
  | { readonly kind: 'drawn'; readonly card: Card }
  | { readonly kind: 'burned'; readonly card: Card }
  | { readonly kind: 'fatigue'; readonly damage: number };

export interface EquippedWeapon {
  readonly card: WeaponCard;
  readonly attack: number;
  readonly durability: number;
}

export interface PlayerStateOptions {
  id: string;
  name: string;
  isAI?: boolean;
  /** Draw pile contents, bottom to top. */
  drawPile?: readonly Card[];
  rules?: RulesConfig;
}

export class PlayerState {
  readonly id: string;
  readonly name: string;
  readonly isAI: boolean;
  private readonly rules: RulesConfig;

  readonly maxHealth: number;
  readonly drawPile: Pile<Card>;

  // Written only through the methods below; the getters hand out read-only views.
  private healthValue: number;
  private manaValue = 0;
  private maxManaValue = 0;
  private readonly handCards: Card[] = [];
  private readonly board: CreatureInstance[] = [];
  private weaponValue: EquippedWeapon | undefined;
  private fatigueValue = 0;
  private cardsPlayed = 0;
  private attacksMade = 0;
  private cardsDrawn = 0;

  constructor(options: PlayerStateOptions) {
    const { id, name, isAI = false, drawPile = [], rules = DEFAULT_RULES } = options;
    this.id = id;
    this.name = name;
    this.isAI = isAI;
    this.rules = rules;
    this.maxHealth = rules.startingHealth;
    this.healthValue = rules.startingHealth;
    this.drawPile = new Pile(drawPile);
  }

  get health(): number {
    return this.healthValue;
  }

  get mana(): number {
    return this.manaValue;
  }

  get maxMana(): number {
    return this.maxManaValue;
  }

  /** Cards in hand, in order. */
  get hand(): readonly Card[] {
    return this.handCards;
  }

  /** Creatures in play, left to right. */
  get battlefield(): readonly CreatureInstance[] {
    return this.board;
  }

  get weapon(): EquippedWeapon | undefined {
    return this.weaponValue;
  }

  /** Empty draws so far. */
  get fatigue(): number {
    return this.fatigueValue;
  }

  get cardsPlayedThisTurn(): number {
    return this.cardsPlayed;
  }

  get attacksThisTurn(): number {
    return this.attacksMade;
  }

  get cardsDrawnThisTurn(): number {
    return this.cardsDrawn;
  }

  // ── Status ────────────────────────────────────────────────

  get isDead(): boolean {
    return this.healthValue <= 0;
  }

  get isHandFull(): boolean {
    return this.handCards.length >= this.rules.handLimit;
  }

  get isBattlefieldFull(): boolean {
    return this.board.length >= this.rules.battlefieldLimit;
  }

  /** Cards in hand that the current mana pays for. */
  playableCards(): Card[] {
    return this.handCards.filter((card) => card.cost <= this.manaValue);
  }

  // ── Drawing ───────────────────────────────────────────────

  /**
   * Draw the top card. A full hand burns it; an empty pile deals
   * fatigue damage that grows by one with every empty draw.
   */
  drawCard(): DrawResult {
    const card = this.drawPile.pop();
    if (card === undefined) {
      this.fatigueValue++;
      this.takeDamage(this.fatigueValue);
      return { kind: 'fatigue', damage: this.fatigueValue };
    }

    this.cardsDrawn++;
    if (this.isHandFull) {
      return { kind: 'burned', card };
    }
    this.handCards.push(card);
    return { kind: 'drawn', card };
  }

  /** Put cards back into the draw pile and reshuffle it. */
  returnToDrawPile(cards: readonly Card[], rng: Rng): void {
    this.drawPile.shuffleIn(cards, rng);
  }

  // ── Mana ──────────────────────────────────────────────────

  spendMana(amount: number): boolean {
    if (amount < 0 || amount > this.manaValue) return false;
    this.manaValue -= amount;
    return true;
  }

  /** Temporary mana for this turn, capped at the mana limit. */
  gainMana(amount: number): void {
    this.manaValue = Math.min(this.manaValue + Math.max(amount, 0), this.rules.maxMana);
  }

  increaseMaxMana(): void {
    this.maxManaValue = Math.min(this.maxManaValue + 1, this.rules.maxMana);
  }

  refreshMana(): void {
    this.manaValue = this.maxManaValue;
  }

  // ── Hand ──────────────────────────────────────────────────

  addToHand(card: Card): boolean {
    if (this.isHandFull) return false;
    this.handCards.push(card);
    return true;
  }

  /** Remove the first copy of a card from the hand. */
  removeFromHand(cardId: string): Card | undefined {
    const index = this.handCards.findIndex((card) => card.id === cardId);
    if (index === -1) return undefined;
    const [card] = this.handCards.splice(index, 1);
    return card;
  }

  /**
   * Remove the cards at the given hand positions.
   *
   * @returns The removed cards, highest position first; empty (and nothing
   *          removed) when a position is out of range or repeated.
   */
  takeFromHand(positions: readonly number[]): Card[] {
    const valid = positions.every(
      (p) => Number.isInteger(p) && p >= 0 && p < this.handCards.length,
    );
    if (!valid || new Set(positions).size !== positions.length) return [];

    const taken: Card[] = [];
    for (const position of [...positions].sort((a, b) => b - a)) {
      taken.push(...this.handCards.splice(position, 1));
    }
    return taken;
  }

  findInHand(cardId: string): Card | undefined {
    return this.handCards.find((card) => card.id === cardId);
  }

  // ── Battlefield ───────────────────────────────────────────

  /**
   * Place a creature. `position` is clamped to the current board; the
   * default appends on the right.
   */
  addToBattlefield(creature: CreatureInstance, position?: number): boolean {
    if (this.isBattlefieldFull) return false;
    const size = this.board.length;
    const index = Math.min(Math.max(position ?? size, 0), size);
    this.board.splice(index, 0, creature);
    return true;
  }

  removeFromBattlefield(instanceId: string): CreatureInstance | undefined {
    const index = this.board.findIndex((c) => c.instanceId === instanceId);
    if (index === -1) return undefined;
    const [creature] = this.board.splice(index, 1);
    return creature;
  }

  getCreature(instanceId: string): CreatureInstance | undefined {
    return this.board.find((c) => c.instanceId === instanceId);
  }

  // ── Hero ──────────────────────────────────────────────────

  /** @returns Damage actually applied; health never drops below 0. */
  takeDamage(amount: number): number {
    if (amount <= 0) return 0;
    const applied = Math.min(amount, Math.max(this.healthValue, 0));
    this.healthValue -= applied;
    return applied;
  }

  /** @returns Health actually restored. */
  heal(amount: number): number {
    if (amount <= 0 || this.isDead) return 0;
    const applied = Math.min(amount, this.maxHealth - this.healthValue);
    this.healthValue += applied;
    return applied;
  }

  /** Equip a weapon, replacing any current one. */
  equipWeapon(card: WeaponCard): void {
    this.weaponValue = { card, attack: card.attack, durability: card.durability };
  }

  // ── Turn hooks ────────────────────────────────────────────

  recordCardPlayed(): void {
    this.cardsPlayed++;
  }

  recordAttack(): void {
    this.attacksMade++;
  }

  /** Grow and refill mana for a new turn; the draw count starts over. */
  prepareTurn(): void {
    this.increaseMaxMana();
    this.refreshMana();
    this.cardsDrawn = 0;
  }

  /** Runs after the turn's draw: clears the play counters and readies the board. */
  startTurn(): void {
    this.cardsPlayed = 0;
    this.attacksMade = 0;
    for (const creature of this.board) {
      creature.startTurn();
    }
  }

  /** Temporary mana does not carry over. */
  endTurn(): void {
    this.manaValue = Math.min(this.manaValue, this.maxManaValue);
  }
}
