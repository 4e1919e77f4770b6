/**
 * Card catalog: the set of cards a match can use.
 *
 * Cards come from a JSON card set, checked first against a zod schema
 * (shape, enums, integers) and then against `validateCard`. Invalid and
 * duplicate entries are rejected and logged; the rest load.
 */

import { z } from 'zod';
import {
  ABILITY_TRIGGERS,
  AMOUNT_EFFECT_TYPES,
  EFFECT_TARGETS,
  KEYWORDS,
  RARITIES,
  STATUS_EFFECT_TYPES,
  createCreatureCard,
  createSpellCard,
  createWeaponCard,
  validateCard,
  type Card,
  type CardType,
  type Keyword,
  type Rarity,
} from './Card';
import { silentLogger, type Logger } from '../core-engine/Logger';

// ── Schema ──────────────────────────────────────────────────

const effectTargetSchema = z.enum(EFFECT_TARGETS);

const effectSchema = z.union([
  z.object({
    type: z.enum(AMOUNT_EFFECT_TYPES),
    value: z.number().int().nonnegative(),
    target: effectTargetSchema,
  }),
  z.object({
    type: z.enum(STATUS_EFFECT_TYPES),
    value: z.number().int().default(0),
    target: effectTargetSchema,
  }),
  z.object({
    type: z.literal('give-keyword'),
    keyword: z.enum(KEYWORDS),
    value: z.number().int().default(0),
    target: effectTargetSchema,
  }),
]);

const abilitySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  trigger: z.enum(ABILITY_TRIGGERS),
  effects: z.array(effectSchema).min(1),
});

const baseCardSchema = z.object({
  id: z.string(),
  name: z.string(),
  cost: z.number().int(),
  rarity: z.enum(RARITIES).default('common'),
  description: z.string().default(''),
  setId: z.string().optional(),
  keywords: z.array(z.enum(KEYWORDS)).default([]),
  abilities: z.array(abilitySchema).default([]),
});

export const cardSchema = z.discriminatedUnion('type', [
  baseCardSchema
    .extend({
      type: z.literal('creature'),
      attack: z.number().int(),
      health: z.number().int(),
    })
    .strict(),
  baseCardSchema.extend({ type: z.literal('spell') }).strict(),
  baseCardSchema
    .extend({
      type: z.literal('weapon'),
      attack: z.number().int(),
      durability: z.number().int(),
    })
    .strict(),
]);

export const cardSetSchema = z.object({
  setId: z.string().min(1).default('core'),
  name: z.string().optional(),
  cards: z.array(z.unknown()),
});

export type RawCard = z.input<typeof cardSchema>;

function toCard(data: z.output<typeof cardSchema>, setId: string): Card {
  const fields = { ...data, setId: data.setId ?? setId };
  switch (fields.type) {
    case 'creature':
      return createCreatureCard(fields);
    case 'spell':
      return createSpellCard(fields);
    case 'weapon':
      return createWeaponCard(fields);
  }
}

// ── Catalog ─────────────────────────────────────────────────

export interface RejectedCard {
  /** Position in the source `cards` array. */
  readonly index: number;
  readonly id?: string;
  readonly errors: readonly string[];
}

export interface CatalogLoadResult {
  readonly catalog: CardCatalog;
  readonly rejected: readonly RejectedCard[];
}

/** Criteria for `CardCatalog.filter`; every given criterion must match. */
export interface CardFilter {
  minCost?: number;
  maxCost?: number;
  type?: CardType;
  rarity?: Rarity;
  setId?: string;
  /** Cards must carry all of these keywords. */
  keywords?: readonly Keyword[];
  /** Stat ranges only match creatures. */
  minAttack?: number;
  maxAttack?: number;
  minHealth?: number;
  maxHealth?: number;
}

export interface CatalogStatistics {
  readonly total: number;
  readonly byType: Readonly<Record<CardType, number>>;
  readonly byRarity: Readonly<Record<Rarity, number>>;
  readonly bySet: Readonly<Record<string, number>>;
  readonly averageCost: number;
}

function within(value: number, min?: number, max?: number): boolean {
  return (min === undefined || value >= min) && (max === undefined || value <= max);
}

export class CardCatalog {
  private readonly byId = new Map<string, Card>();

  /**
   * @throws If two cards share an id or a card fails `validateCard`.
   */
  constructor(cards: readonly Card[] = []) {
    for (const card of cards) {
      const errors = validateCard(card);
      if (errors.length > 0) {
        throw new Error(`Invalid card "${card.id}": ${errors.join('; ')}`);
      }
      if (this.byId.has(card.id)) {
        throw new Error(`Duplicate card id "${card.id}"`);
      }
      this.byId.set(card.id, card);
    }
  }

  /**
   * Build a catalog from a parsed JSON card set.
   *
   * @throws If `raw` is not a card set at all (no `cards` array).
   */
  static fromJson(raw: unknown, logger: Logger = silentLogger): CatalogLoadResult {
    const set = cardSetSchema.safeParse(raw);
    if (!set.success) {
      throw new Error(`Malformed card set: ${set.error.issues[0]?.message ?? 'unknown error'}`);
    }

    const accepted: Card[] = [];
    const acceptedIds = new Set<string>();
    const rejected: RejectedCard[] = [];

    set.data.cards.forEach((entry, index) => {
      const parsed = cardSchema.safeParse(entry);
      if (!parsed.success) {
        const errors = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || 'card'}: ${issue.message}`,
        );
        rejected.push({ index, id: idOf(entry), errors });
        return;
      }

      const card = toCard(parsed.data, set.data.setId);
      const errors = validateCard(card);
      if (acceptedIds.has(card.id)) {
        errors.push(`Duplicate card id "${card.id}"`);
      }
      if (errors.length > 0) {
        rejected.push({ index, id: card.id, errors });
        return;
      }

      acceptedIds.add(card.id);
      accepted.push(card);
    });

    for (const entry of rejected) {
      logger.error(
        `Rejected card #${entry.index}${entry.id ? ` (${entry.id})` : ''}: ${entry.errors.join('; ')}`,
      );
    }
    logger.info(`Loaded ${accepted.length} cards from set "${set.data.setId}"`);

    return { catalog: new CardCatalog(accepted), rejected };
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): Card | undefined {
    return this.byId.get(id);
  }

  /** @throws If the id is unknown. */
  require(id: string): Card {
    const card = this.byId.get(id);
    if (card === undefined) {
      throw new Error(`Unknown card id "${id}"`);
    }
    return card;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** All cards in load order. */
  all(): Card[] {
    return [...this.byId.values()];
  }

  filter(criteria: CardFilter): Card[] {
    const statFilter =
      criteria.minAttack !== undefined ||
      criteria.maxAttack !== undefined ||
      criteria.minHealth !== undefined ||
      criteria.maxHealth !== undefined;

    return this.all().filter((card) => {
      if (!within(card.cost, criteria.minCost, criteria.maxCost)) return false;
      if (criteria.type !== undefined && card.type !== criteria.type) return false;
      if (criteria.rarity !== undefined && card.rarity !== criteria.rarity) return false;
      if (criteria.setId !== undefined && card.setId !== criteria.setId) return false;
      if (criteria.keywords?.some((k) => !card.keywords.includes(k))) return false;
      if (statFilter) {
        if (card.type !== 'creature') return false;
        if (!within(card.attack, criteria.minAttack, criteria.maxAttack)) return false;
        if (!within(card.health, criteria.minHealth, criteria.maxHealth)) return false;
      }
      return true;
    });
  }

  /** Case-insensitive substring match on card names. */
  search(query: string): Card[] {
    const needle = query.trim().toLowerCase();
    return this.all().filter((card) => card.name.toLowerCase().includes(needle));
  }

  statistics(): CatalogStatistics {
    const byType: Record<CardType, number> = { creature: 0, spell: 0, weapon: 0 };
    const byRarity: Record<Rarity, number> = {
      common: 0,
      rare: 0,
      epic: 0,
      legendary: 0,
    };
    const bySet: Record<string, number> = {};
    let costSum = 0;

    for (const card of this.byId.values()) {
      byType[card.type]++;
      byRarity[card.rarity]++;
      bySet[card.setId] = (bySet[card.setId] ?? 0) + 1;
      costSum += card.cost;
    }

    return {
      total: this.size,
      byType,
      byRarity,
      bySet,
      averageCost: this.size === 0 ? 0 : costSum / this.size,
    };
  }
}

function idOf(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'id' in entry) {
    return typeof entry.id === 'string' ? entry.id : undefined;
  }
  return undefined;
}
