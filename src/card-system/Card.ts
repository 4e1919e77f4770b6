/**
 * Card definitions for the SpireSmiths engine.
 *
 * A Card is an immutable catalog entry. The `type` field discriminates
 * between creatures, spells and weapons, and each variant carries only
 * the combat stats that apply to it.
 */

// ── Enumerations ────────────────────────────────────────────

export const CARD_TYPES = ['creature', 'spell', 'weapon'] as const;

export type CardType = (typeof CARD_TYPES)[number];

export const RARITIES = ['common', 'rare', 'epic', 'legendary'] as const;

export type Rarity = (typeof RARITIES)[number];

/** Keyword tags a card (and the creature it summons) can carry. */
export const KEYWORDS = [
  'taunt',
  'charge',
  'divine-shield',
  'stealth',
  'lifesteal',
  'windfury',
  'spell-damage',
  'poisonous',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

/** When an ability fires. */
export const ABILITY_TRIGGERS = [
  'cast',
  'battlecry',
  'deathrattle',
  'end-of-turn',
] as const;

export type AbilityTrigger = (typeof ABILITY_TRIGGERS)[number];

/** Who an effect lands on. `chosen` uses the target supplied with the intent. */
export const EFFECT_TARGETS = [
  'chosen',
  'enemy-hero',
  'friendly-hero',
  'enemy-creatures',
  'friendly-creatures',
  'all-creatures',
  'self',
] as const;

export type EffectTarget = (typeof EFFECT_TARGETS)[number];

/** Effects that scale with their `value`. */
export const AMOUNT_EFFECT_TYPES = [
  'damage',
  'heal',
  'draw-card',
  'gain-mana',
  'buff-attack',
  'buff-health',
] as const;

/** Effects that change a creature's status; `value` is unused. */
export const STATUS_EFFECT_TYPES = ['silence', 'freeze', 'destroy'] as const;

// ── Effects and abilities ───────────────────────────────────

interface BaseEffect {
  readonly value: number;
  readonly target: EffectTarget;
}

export interface AmountEffect extends BaseEffect {
  readonly type: (typeof AMOUNT_EFFECT_TYPES)[number];
}

export interface StatusEffect extends BaseEffect {
  readonly type: (typeof STATUS_EFFECT_TYPES)[number];
}

export interface GiveKeywordEffect extends BaseEffect {
  readonly type: 'give-keyword';
  readonly keyword: Keyword;
}

export type EffectDefinition = AmountEffect | StatusEffect | GiveKeywordEffect;

export type EffectType = EffectDefinition['type'];

export interface AbilityDefinition {
  readonly id: string;
  readonly name: string;
  readonly trigger: AbilityTrigger;
  readonly effects: readonly EffectDefinition[];
}

// ── Card variants ───────────────────────────────────────────

interface BaseCard {
  readonly id: string;
  readonly name: string;
  readonly cost: number;
  readonly rarity: Rarity;
  readonly description: string;
  readonly setId: string;
  readonly keywords: readonly Keyword[];
  readonly abilities: readonly AbilityDefinition[];
}

export interface CreatureCard extends BaseCard {
  readonly type: 'creature';
  readonly attack: number;
  readonly health: number;
}

export interface SpellCard extends BaseCard {
  readonly type: 'spell';
}

export interface WeaponCard extends BaseCard {
  readonly type: 'weapon';
  readonly attack: number;
  readonly durability: number;
}

/** Discriminated union of every catalog card. */
export type Card = CreatureCard | SpellCard | WeaponCard;

// ── Factories ───────────────────────────────────────────────

/** Fields every factory accepts; presentation and ability fields default. */
interface CommonFields {
  id: string;
  name: string;
  cost: number;
  rarity?: Rarity;
  description?: string;
  setId?: string;
  keywords?: readonly Keyword[];
  abilities?: readonly AbilityDefinition[];
}

function commonFields(fields: CommonFields): BaseCard {
  return {
    id: fields.id,
    name: fields.name,
    cost: fields.cost,
    rarity: fields.rarity ?? 'common',
    description: fields.description ?? '',
    setId: fields.setId ?? 'core',
    keywords: Object.freeze([...(fields.keywords ?? [])]),
    abilities: Object.freeze([...(fields.abilities ?? [])]),
  };
}

/** Create a frozen creature card. */
export function createCreatureCard(
  fields: CommonFields & { attack: number; health: number },
): CreatureCard {
  return Object.freeze({
    ...commonFields(fields),
    type: 'creature',
    attack: fields.attack,
    health: fields.health,
  });
}

/** Create a frozen spell card. */
export function createSpellCard(fields: CommonFields): SpellCard {
  return Object.freeze({ ...commonFields(fields), type: 'spell' });
}

/** Create a frozen weapon card. */
export function createWeaponCard(
  fields: CommonFields & { attack: number; durability: number },
): WeaponCard {
  return Object.freeze({
    ...commonFields(fields),
    type: 'weapon',
    attack: fields.attack,
    durability: fields.durability,
  });
}

// ── Queries ─────────────────────────────────────────────────

export function isCreatureCard(card: Card): card is CreatureCard {
  return card.type === 'creature';
}

export function isSpellCard(card: Card): card is SpellCard {
  return card.type === 'spell';
}

export function isWeaponCard(card: Card): card is WeaponCard {
  return card.type === 'weapon';
}

export function cardHasKeyword(card: Card, keyword: Keyword): boolean {
  return card.keywords.includes(keyword);
}

/** Attack + health for creatures, attack + durability for weapons, 0 for spells. */
export function totalStats(card: Card): number {
  switch (card.type) {
    case 'creature':
      return card.attack + card.health;
    case 'weapon':
      return card.attack + card.durability;
    case 'spell':
      return 0;
  }
}

/** Abilities of the card that fire on the given trigger. */
export function abilitiesFor(
  abilities: readonly AbilityDefinition[],
  trigger: AbilityTrigger,
): AbilityDefinition[] {
  return abilities.filter((a) => a.trigger === trigger);
}

/** Whether any effect of the card needs a target chosen by the player. */
export function needsChosenTarget(card: Card): boolean {
  return card.abilities.some((a) =>
    a.effects.some((e) => e.target === 'chosen'),
  );
}

// ── Validation ──────────────────────────────────────────────

/**
 * Check a card against the catalog rules.
 *
 * @returns A list of error messages; empty when the card is valid.
 */
export function validateCard(card: Card): string[] {
  const errors: string[] = [];

  if (card.id.trim() === '') {
    errors.push('Card id cannot be empty');
  }
  if (card.name.trim() === '') {
    errors.push('Card name cannot be empty');
  }
  if (!Number.isInteger(card.cost) || card.cost < 0) {
    errors.push(`Card cost must be a non-negative integer (got ${card.cost})`);
  }

  switch (card.type) {
    case 'creature':
      if (!Number.isInteger(card.attack) || card.attack < 0) {
        errors.push(`Creature attack must be >= 0 (got ${card.attack})`);
      }
      if (!Number.isInteger(card.health) || card.health <= 0) {
        errors.push(`Creature health must be > 0 (got ${card.health})`);
      }
      if ('durability' in card) {
        errors.push('Creature cards cannot have durability');
      }
      break;
    case 'weapon':
      if (!Number.isInteger(card.attack) || card.attack <= 0) {
        errors.push(`Weapon attack must be > 0 (got ${card.attack})`);
      }
      if (!Number.isInteger(card.durability) || card.durability <= 0) {
        errors.push(`Weapon durability must be > 0 (got ${card.durability})`);
      }
      if ('health' in card) {
        errors.push('Weapon cards cannot have health');
      }
      break;
    case 'spell':
      if ('attack' in card || 'health' in card || 'durability' in card) {
        errors.push('Spell cards cannot have combat stats');
      }
      break;
  }

  for (const ability of card.abilities) {
    if (card.type === 'spell' && ability.trigger !== 'cast') {
      errors.push(`Spell ability "${ability.name}" must use the cast trigger`);
    }
    if (card.type !== 'spell' && ability.trigger === 'cast') {
      errors.push(`Only spells can have cast abilities ("${ability.name}")`);
    }
  }

  return errors;
}

/** One-line description for logs, e.g. `Fire Elemental (3) [3/2] - creature`. */
export function describeCard(card: Card): string {
  let stats = '';
  if (card.type === 'creature') {
    stats = ` [${card.attack}/${card.health}]`;
  } else if (card.type === 'weapon') {
    stats = ` [${card.attack}/${card.durability}]`;
  }
  return `${card.name} (${card.cost})${stats} - ${card.type}`;
}
