/**
 * Card System Module
 *
 * Card definitions, the card catalog, deck-building rules and the Pile
 * used for draw piles.
 */
export const CARD_SYSTEM_VERSION = '0.2.0';

// Card types, factories and validation
export type {
  Card,
  CardType,
  Rarity,
  Keyword,
  AbilityTrigger,
  EffectTarget,
  EffectType,
  EffectDefinition,
  AmountEffect,
  StatusEffect,
  GiveKeywordEffect,
  AbilityDefinition,
  CreatureCard,
  SpellCard,
  WeaponCard,
} from './Card';
export {
  CARD_TYPES,
  RARITIES,
  KEYWORDS,
  ABILITY_TRIGGERS,
  EFFECT_TARGETS,
  createCreatureCard,
  createSpellCard,
  createWeaponCard,
  isCreatureCard,
  isSpellCard,
  isWeaponCard,
  cardHasKeyword,
  totalStats,
  abilitiesFor,
  needsChosenTarget,
  validateCard,
  describeCard,
} from './Card';

// Catalog
export type {
  CardFilter,
  CatalogLoadResult,
  CatalogStatistics,
  RejectedCard,
  RawCard,
} from './CardCatalog';
export { CardCatalog, cardSchema } from './CardCatalog';

// Decks
export type {
  DeckDefinition,
  DeckEntry,
  DeckStatistics,
  DeckValidationResult,
  DeckEditResult,
  DeckResolveResult,
  RawDeck,
} from './Deck';
export {
  DECK_SIZE,
  MAX_CARD_COPIES,
  MAX_LEGENDARY_COPIES,
  copyLimit,
  totalCards,
  countOf,
  deckStatistics,
  validateDeck,
  addCard,
  removeCard,
  resolveDeck,
  toRawDeck,
  expandDeck,
  buildDrawPile,
} from './Deck';

// Data files
export {
  DEFAULT_CATALOG_PATH,
  DEFAULT_DECKS_PATH,
  loadCatalogFile,
  loadDeckFile,
  findDeck,
} from './dataFiles';

// Pile abstraction
export { Pile } from './Pile';
