/**
 * Node helpers that load the bundled JSON card set and starter decks.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { CardCatalog, type CatalogLoadResult } from './CardCatalog';
import { resolveDeck, type DeckDefinition } from './Deck';
import { silentLogger, type Logger } from '../core-engine/Logger';

export const DEFAULT_CATALOG_PATH = new URL(
  '../../data/cards/core-set.json',
  import.meta.url,
);

export const DEFAULT_DECKS_PATH = new URL(
  '../../data/decks/starter-decks.json',
  import.meta.url,
);

const deckFileSchema = z.object({ decks: z.array(z.unknown()) });

function readJson(path: string | URL): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/** Read and validate a card set file. */
export function loadCatalogFile(
  path: string | URL = DEFAULT_CATALOG_PATH,
  logger: Logger = silentLogger,
): CatalogLoadResult {
  return CardCatalog.fromJson(readJson(path), logger);
}

/**
 * Read a deck file and resolve every deck against the catalog.
 *
 * @throws If the file is malformed or any deck names an unknown card.
 */
export function loadDeckFile(
  catalog: CardCatalog,
  path: string | URL = DEFAULT_DECKS_PATH,
): DeckDefinition[] {
  const file = deckFileSchema.parse(readJson(path));
  return file.decks.map((raw, index) => {
    const result = resolveDeck(raw, catalog);
    if (!result.ok) {
      throw new Error(`Deck #${index} is invalid: ${result.errors.join('; ')}`);
    }
    return result.deck;
  });
}

/** @throws If no deck has the id. */
export function findDeck(decks: readonly DeckDefinition[], id: string): DeckDefinition {
  const deck = decks.find((d) => d.id === id);
  if (deck === undefined) {
    throw new Error(`Unknown deck id "${id}"`);
  }
  return deck;
}
