/**
 * Deck definitions and deck-building rules.
 *
 * A DeckDefinition is an ordered list of `{ card, count }` entries. All
 * operations here are pure: editing helpers return a new definition and
 * validation reports problems instead of throwing. `buildDrawPile` turns a
 * definition into a shuffled Pile for a match.
 */

import { z } from 'zod';
import { validateCard, type Card, type CardType } from './Card';
import type { CardCatalog } from './CardCatalog';
import { shuffle, type Rng } from '../core-engine/Rng';
import { Pile } from './Pile';

// ── Constants ───────────────────────────────────────────────

export const DECK_SIZE = 30;
export const MAX_CARD_COPIES = 2;
export const MAX_LEGENDARY_COPIES = 1;

/** Share of cards costing 7+ above which a deck is flagged as top-heavy. */
const HIGH_COST_WARNING_RATIO = 0.3;
/** Share of cards costing 0-1 below which a deck is flagged as slow. */
const LOW_COST_WARNING_RATIO = 0.15;

/** Highest bucket of the mana curve; it also counts everything above. */
export const MANA_CURVE_CAP = 10;

// ── Types ───────────────────────────────────────────────────

export interface DeckEntry {
  readonly card: Card;
  readonly count: number;
}

export interface DeckDefinition {
  readonly id: string;
  readonly name: string;
  readonly heroClass: string;
  readonly entries: readonly DeckEntry[];
}

export interface DeckStatistics {
  readonly totalCards: number;
  readonly uniqueCards: number;
  readonly byType: Readonly<Record<CardType, number>>;
  /** Card counts by cost; index 10 holds every card costing 10 or more. */
  readonly manaCurve: readonly number[];
  readonly averageCost: number;
}

export interface DeckValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly stats: DeckStatistics;
}

export type DeckEditResult =
  | { readonly ok: true; readonly deck: DeckDefinition }
  | { readonly ok: false; readonly error: string };

export type DeckResolveResult =
  | { readonly ok: true; readonly deck: DeckDefinition }
  | { readonly ok: false; readonly errors: readonly string[] };

// ── Queries ─────────────────────────────────────────────────

/** Maximum copies of a card allowed in one deck. */
export function copyLimit(card: Card): number {
  return card.rarity === 'legendary' ? MAX_LEGENDARY_COPIES : MAX_CARD_COPIES;
}

export function totalCards(deck: DeckDefinition): number {
  return deck.entries.reduce((sum, entry) => sum + entry.count, 0);
}

export function countOf(deck: DeckDefinition, cardId: string): number {
  return deck.entries
    .filter((entry) => entry.card.id === cardId)
    .reduce((sum, entry) => sum + entry.count, 0);
}

export function deckStatistics(deck: DeckDefinition): DeckStatistics {
  const byType: Record<CardType, number> = { creature: 0, spell: 0, weapon: 0 };
  const manaCurve: number[] = new Array<number>(MANA_CURVE_CAP + 1).fill(0);
  let total = 0;
  let costSum = 0;

  for (const { card, count } of deck.entries) {
    byType[card.type] += count;
    manaCurve[Math.min(card.cost, MANA_CURVE_CAP)] += count;
    total += count;
    costSum += card.cost * count;
  }

  return {
    totalCards: total,
    uniqueCards: new Set(deck.entries.map((e) => e.card.id)).size,
    byType,
    manaCurve,
    averageCost: total === 0 ? 0 : costSum / total,
  };
}

// ── Validation ──────────────────────────────────────────────

/**
 * Check a deck against the construction rules.
 *
 * The deck is valid iff it holds exactly {@link DECK_SIZE} cards, no card
 * exceeds its copy limit, every card passes `validateCard`, and no card id
 * appears in two entries. Curve problems are reported as warnings only.
 */
export function validateDeck(deck: DeckDefinition): DeckValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const stats = deckStatistics(deck);

  if (stats.totalCards !== DECK_SIZE) {
    errors.push(
      `Deck must contain exactly ${DECK_SIZE} cards (has ${stats.totalCards})`,
    );
  }

  const seen = new Set<string>();
  for (const { card, count } of deck.entries) {
    if (seen.has(card.id)) {
      errors.push(`Card "${card.id}" appears in more than one entry`);
    }
    seen.add(card.id);

    if (!Number.isInteger(count) || count < 1) {
      errors.push(`Card "${card.id}" count must be a positive integer (got ${count})`);
    }

    const limit = copyLimit(card);
    if (count > limit) {
      errors.push(
        card.rarity === 'legendary'
          ? `Legendary card "${card.id}" is limited to ${limit} copy (has ${count})`
          : `Card "${card.id}" is limited to ${limit} copies (has ${count})`,
      );
    }

    for (const message of validateCard(card)) {
      errors.push(`Card "${card.id}": ${message}`);
    }
  }

  if (stats.totalCards > 0) {
    const highCost = deck.entries
      .filter((e) => e.card.cost >= 7)
      .reduce((sum, e) => sum + e.count, 0);
    const lowCost = deck.entries
      .filter((e) => e.card.cost <= 1)
      .reduce((sum, e) => sum + e.count, 0);

    if (highCost / stats.totalCards > HIGH_COST_WARNING_RATIO) {
      warnings.push(
        `Deck is top-heavy: ${highCost} of ${stats.totalCards} cards cost 7 or more`,
      );
    }
    if (lowCost / stats.totalCards < LOW_COST_WARNING_RATIO) {
      warnings.push(
        `Deck has few early plays: ${lowCost} of ${stats.totalCards} cards cost 1 or less`,
      );
    }
  }

  return { isValid: errors.length === 0, errors, warnings, stats };
}

// ── Editing ─────────────────────────────────────────────────

/** Add copies of a card, respecting copy limits and the deck size. */
export function addCard(
  deck: DeckDefinition,
  card: Card,
  count = 1,
): DeckEditResult {
  if (!Number.isInteger(count) || count < 1) {
    return { ok: false, error: `Count must be a positive integer (got ${count})` };
  }

  const existing = countOf(deck, card.id);
  const limit = copyLimit(card);
  if (existing + count > limit) {
    return {
      ok: false,
      error: `Cannot add ${count} x "${card.id}": limit is ${limit}, deck has ${existing}`,
    };
  }
  if (totalCards(deck) + count > DECK_SIZE) {
    return { ok: false, error: `Deck cannot exceed ${DECK_SIZE} cards` };
  }

  const entries =
    existing > 0
      ? deck.entries.map((e) =>
          e.card.id === card.id ? { card: e.card, count: e.count + count } : e,
        )
      : [...deck.entries, { card, count }];

  return { ok: true, deck: { ...deck, entries } };
}

/** Remove copies of a card; an entry that drops to zero disappears. */
export function removeCard(
  deck: DeckDefinition,
  cardId: string,
  count = 1,
): DeckEditResult {
  if (!Number.isInteger(count) || count < 1) {
    return { ok: false, error: `Count must be a positive integer (got ${count})` };
  }

  const existing = countOf(deck, cardId);
  if (existing === 0) {
    return { ok: false, error: `Card "${cardId}" is not in the deck` };
  }
  if (count > existing) {
    return {
      ok: false,
      error: `Cannot remove ${count} x "${cardId}": deck has ${existing}`,
    };
  }

  const entries = deck.entries
    .map((e) => (e.card.id === cardId ? { card: e.card, count: e.count - count } : e))
    .filter((e) => e.count > 0);

  return { ok: true, deck: { ...deck, entries } };
}

// ── JSON decks ──────────────────────────────────────────────

export const deckFileEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  heroClass: z.string().min(1).default('neutral'),
  cards: z.array(
    z.object({
      cardId: z.string().min(1),
      count: z.number().int().positive(),
    }),
  ),
});

export type RawDeck = z.input<typeof deckFileEntrySchema>;

/**
 * Turn a JSON deck (`{ id, name, heroClass, cards: [{ cardId, count }] }`)
 * into a definition backed by catalog cards.
 */
export function resolveDeck(raw: unknown, catalog: CardCatalog): DeckResolveResult {
  const parsed = deckFileEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'deck'}: ${issue.message}`,
      ),
    };
  }

  const errors: string[] = [];
  const entries: DeckEntry[] = [];
  for (const { cardId, count } of parsed.data.cards) {
    const card = catalog.get(cardId);
    if (card === undefined) {
      errors.push(`Unknown card id "${cardId}" in deck "${parsed.data.id}"`);
      continue;
    }
    entries.push({ card, count });
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    deck: {
      id: parsed.data.id,
      name: parsed.data.name,
      heroClass: parsed.data.heroClass,
      entries,
    },
  };
}

/** Inverse of `resolveDeck`. */
export function toRawDeck(deck: DeckDefinition): RawDeck {
  return {
    id: deck.id,
    name: deck.name,
    heroClass: deck.heroClass,
    cards: deck.entries.map((e) => ({ cardId: e.card.id, count: e.count })),
  };
}

// ── Shuffling and draw piles ────────────────────────────────

/** Expand entries into individual card references, in entry order. */
export function expandDeck(deck: DeckDefinition): Card[] {
  const cards: Card[] = [];
  for (const { card, count } of deck.entries) {
    for (let i = 0; i < count; i++) {
      cards.push(card);
    }
  }
  return cards;
}

/** A shuffled draw pile for one match. The definition is not touched. */
export function buildDrawPile(
  deck: DeckDefinition,
  rng: Rng = Math.random,
): Pile<Card> {
  return new Pile(shuffle(expandDeck(deck), rng));
}
