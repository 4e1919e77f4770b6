/**
 * A creature on the battlefield.
 *
 * Each summon creates a new instance with its own id, so two copies of the
 * same card are tracked separately. The instance owns its combat state;
 * the Match decides when it dies (health at or below zero).
 */

import type {
  AbilityDefinition,
  CreatureCard,
  Keyword,
} from '../card-system/Card';

/**
 * Attack readiness of a creature.
 *
 * - `summoned`  -- Entered play this turn (summoning sickness).
 * - `ready`     -- May attack.
 * - `attacked`  -- Used its attack(s) this turn.
 * - `exhausted` -- Sits out this turn (e.g. thawing from a freeze).
 */
export type CreatureState = 'summoned' | 'ready' | 'attacked' | 'exhausted';

export type ModifiedStat = 'attack' | 'health';

/** A stat change applied by an effect. */
export interface StatModifier {
  readonly stat: ModifiedStat;
  readonly amount: number;
  /** Turns left before it expires; `undefined` lasts until silenced. */
  remainingTurns?: number;
}

export class CreatureInstance {
  readonly instanceId: string;
  readonly card: CreatureCard;
  readonly ownerId: string;

  readonly baseAttack: number;
  readonly baseHealth: number;
  attack: number;
  maxHealth: number;
  health: number;

  readonly keywords: Set<Keyword>;
  abilities: AbilityDefinition[];
  modifiers: StatModifier[] = [];

  state: CreatureState;
  frozen = false;
  silenced = false;
  attackEligible: boolean;

  timesAttackedThisTurn = 0;
  damageTakenThisTurn = 0;
  damageDealtThisTurn = 0;

  constructor(card: CreatureCard, instanceId: string, ownerId: string) {
    this.instanceId = instanceId;
    this.card = card;
    this.ownerId = ownerId;

    this.baseAttack = card.attack;
    this.baseHealth = card.health;
    this.attack = card.attack;
    this.maxHealth = card.health;
    this.health = card.health;

    this.keywords = new Set(card.keywords);
    this.abilities = [...card.abilities];

    const charge = this.keywords.has('charge');
    this.state = charge ? 'ready' : 'summoned';
    this.attackEligible = charge;
  }

  get cardId(): string {
    return this.card.id;
  }

  get name(): string {
    return this.card.name;
  }

  get isAlive(): boolean {
    return this.health > 0;
  }

  hasKeyword(keyword: Keyword): boolean {
    return this.keywords.has(keyword);
  }

  addKeyword(keyword: Keyword): void {
    this.keywords.add(keyword);
  }

  removeKeyword(keyword: Keyword): void {
    this.keywords.delete(keyword);
  }

  /** Attacks allowed per turn: two with Windfury, otherwise one. */
  get attacksPerTurn(): number {
    return this.hasKeyword('windfury') ? 2 : 1;
  }

  canAttack(): boolean {
    return (
      this.isAlive &&
      this.state !== 'attacked' &&
      this.state !== 'exhausted' &&
      this.attackEligible &&
      !this.frozen &&
      this.timesAttackedThisTurn < this.attacksPerTurn
    );
  }

  /**
   * Spend one attack.
   *
   * @returns false (and changes nothing) when the creature cannot attack.
   */
  declareAttack(): boolean {
    if (!this.canAttack()) return false;

    this.timesAttackedThisTurn++;
    if (this.timesAttackedThisTurn >= this.attacksPerTurn) {
      this.state = 'attacked';
    }
    this.keywords.delete('stealth');
    return true;
  }

  /** Reset for the owner's new turn. */
  startTurn(): void {
    this.timesAttackedThisTurn = 0;
    this.damageTakenThisTurn = 0;
    this.damageDealtThisTurn = 0;
    this.tickModifiers();

    if (this.frozen) {
      this.frozen = false;
      this.state = 'exhausted';
      this.attackEligible = false;
    } else {
      this.state = 'ready';
      this.attackEligible = true;
    }
  }

  /**
   * Apply damage. A Divine Shield absorbs one whole hit and is lost.
   *
   * @returns Damage actually applied (0 when absorbed).
   */
  takeDamage(amount: number): number {
    if (amount <= 0) return 0;

    if (this.keywords.has('divine-shield')) {
      this.keywords.delete('divine-shield');
      return 0;
    }

    const applied = Math.min(amount, Math.max(this.health, 0));
    this.health -= applied;
    this.damageTakenThisTurn += applied;
    return applied;
  }

  /** @returns Health actually restored. */
  heal(amount: number): number {
    if (amount <= 0 || !this.isAlive) return 0;
    const applied = Math.min(amount, this.maxHealth - this.health);
    this.health += applied;
    return applied;
  }

  recordDamageDealt(amount: number): void {
    this.damageDealtThisTurn += amount;
  }

  /**
   * Raise (or lower) attack. With `duration` the change reverts after that
   * many of the owner's turn starts.
   */
  buffAttack(amount: number, duration?: number): void {
    this.attack = Math.max(0, this.attack + amount);
    this.modifiers.push({ stat: 'attack', amount, remainingTurns: duration });
  }

  /** Raise max and current health together. */
  buffHealth(amount: number, duration?: number): void {
    this.maxHealth += amount;
    this.health += amount;
    this.modifiers.push({ stat: 'health', amount, remainingTurns: duration });
  }

  freeze(): void {
    this.frozen = true;
  }

  /** Marks the creature for removal by the Match. */
  destroy(): void {
    this.health = 0;
  }

  /**
   * Strip keywords, abilities and modifiers and fall back to the card's
   * base stats. Current health never exceeds the new maximum.
   */
  silence(): void {
    this.keywords.clear();
    this.abilities = [];
    this.modifiers = [];
    this.attack = this.baseAttack;
    this.maxHealth = this.baseHealth;
    this.health = Math.min(this.health, this.maxHealth);
    this.silenced = true;
  }

  private tickModifiers(): void {
    const kept: StatModifier[] = [];
    for (const modifier of this.modifiers) {
      if (modifier.remainingTurns === undefined) {
        kept.push(modifier);
        continue;
      }
      modifier.remainingTurns--;
      if (modifier.remainingTurns > 0) {
        kept.push(modifier);
      } else {
        this.revert(modifier);
      }
    }
    this.modifiers = kept;
  }

  private revert(modifier: StatModifier): void {
    if (modifier.stat === 'attack') {
      this.attack = Math.max(0, this.attack - modifier.amount);
    } else {
      this.maxHealth = Math.max(1, this.maxHealth - modifier.amount);
      this.health = Math.min(this.health, this.maxHealth);
    }
  }
}
