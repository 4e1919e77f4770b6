/**
 * Core Engine Module
 *
 * Foundations shared by the rest of the engine: phases and turn order,
 * typed match events, rules configuration, logging and seeded randomness.
 */

// Game state and turn sequencing
export type { GamePhase, PlayerInfo, GameState, GameStateOptions } from './GameState';
export { createGameState } from './GameState';
export {
  getCurrentPlayer,
  getCurrentPlayerState,
  otherIndex,
  isGameOver,
  passTurn,
  beginTurn,
  transitionTo,
  endGame,
} from './TurnSequencer';

// Typed event emitter
export type {
  EntityRef,
  WinReason,
  GameStartedPayload,
  CardDrawnPayload,
  CardBurnedPayload,
  FatigueDamagePayload,
  MulliganPayload,
  TurnStartedPayload,
  TurnEndedPayload,
  CardPlayedPayload,
  CreatureSummonedPayload,
  WeaponEquippedPayload,
  AttackPayload,
  DamagePayload,
  HealPayload,
  CreatureDestroyedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventRecord,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter, isEventOfType } from './GameEventEmitter';

// Rules configuration
export type { RulesConfig } from './RulesConfig';
export { createRulesConfig, rulesConfigSchema, DEFAULT_RULES } from './RulesConfig';

// Logging
export type { Logger, LogLevel, LogSink, LoggerOptions } from './Logger';
export {
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  createLogger,
  silentLogger,
  parseLogLevel,
} from './Logger';

// Randomness
export type { Rng } from './Rng';
export { Xorshift32, createSeededRng, shuffle } from './Rng';
