/**
 * SpireSmiths Core
 *
 * Headless rules engine and AI opponent for a two-player card battle game.
 */

export * from './card-system';
export * from './core-engine';
export * from './rule-engine';
export * from './ai';
