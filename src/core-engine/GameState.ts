/**
 * Game phase and state types for the SpireSmiths engine.
 *
 * GamePhase is the turn cycle of a match. GameState is a generic container
 * that tracks the two seats, whose turn it is and the phase.
 */

/**
 * Phases of a match.
 *
 * - `init`       -- Constructed, nothing dealt yet.
 * - `mulligan`   -- Opening hands dealt; each player may replace cards.
 * - `start-turn` -- Mana, draw and creature resets for the active player.
 * - `main`       -- The active player submits intents.
 * - `end-turn`   -- End-of-turn bookkeeping for the active player.
 * - `game-over`  -- Terminal.
 */
export type GamePhase =
  | 'init'
  | 'mulligan'
  | 'start-turn'
  | 'main'
  | 'end-turn'
  | 'game-over';

/** Identifies a seat. */
export interface PlayerInfo {
  /** Stable id used by intents and events (e.g. "player1"). */
  readonly id: string;
  /** Display name for the player. */
  readonly name: string;
  /** Whether this player is controlled by the computer. */
  readonly isAI: boolean;
}

/**
 * Generic game state container.
 *
 * @typeParam T  Per-player state (a PlayerState in a match).
 */
export interface GameState<T> {
  /** Information about each player, indexed by seat. */
  readonly players: readonly PlayerInfo[];
  /** Per-player state, parallel to `players`. */
  readonly playerStates: T[];
  /** Seat of the active player. */
  currentPlayerIndex: number;
  phase: GamePhase;
  /** Turn counter; 0 until the first turn starts. */
  turnNumber: number;
}

export interface GameStateOptions<T> {
  /** Player info (exactly 2 entries). */
  players: readonly PlayerInfo[];
  /** Per-player state factory. Called once per seat. */
  createPlayerState: (playerIndex: number) => T;
  /** Starting phase (defaults to 'init'). */
  initialPhase?: GamePhase;
  /** Seat of the first player to act (defaults to 0). */
  firstPlayerIndex?: number;
}

/**
 * Create a new GameState from options.
 *
 * @throws If there are not exactly 2 players.
 * @throws If `firstPlayerIndex` is out of bounds.
 * @throws If two players share an id.
 */
export function createGameState<T>(options: GameStateOptions<T>): GameState<T> {
  const {
    players,
    createPlayerState,
    initialPhase = 'init',
    firstPlayerIndex = 0,
  } = options;

  if (players.length !== 2) {
    throw new Error(`A match requires exactly 2 players, got ${players.length}`);
  }

  if (firstPlayerIndex < 0 || firstPlayerIndex >= players.length) {
    throw new Error(
      `firstPlayerIndex ${firstPlayerIndex} is out of bounds for ${players.length} players`,
    );
  }

  if (new Set(players.map((p) => p.id)).size !== players.length) {
    throw new Error('Player ids must be unique');
  }

  const playerStates = players.map((_, i) => createPlayerState(i));

  return {
    players,
    playerStates,
    currentPlayerIndex: firstPlayerIndex,
    phase: initialPhase,
    turnNumber: 0,
  };
}
