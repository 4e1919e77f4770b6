/**
 * Turn sequencer for the SpireSmiths engine.
 *
 * Functions that manage seat rotation and phase transitions within a
 * GameState. They mutate the state directly; the Match owns the state and
 * decides when to call them.
 */

import type { GamePhase, GameState, PlayerInfo } from './GameState';

// ── Query functions ─────────────────────────────────────────

/** Get the active player's info. */
export function getCurrentPlayer<T>(state: GameState<T>): PlayerInfo {
  return state.players[state.currentPlayerIndex];
}

/** Get the active player's state. */
export function getCurrentPlayerState<T>(state: GameState<T>): T {
  return state.playerStates[state.currentPlayerIndex];
}

/** The other seat of a two-player game. */
export function otherIndex(index: number): number {
  return index === 0 ? 1 : 0;
}

export function isGameOver<T>(state: GameState<T>): boolean {
  return state.phase === 'game-over';
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Hand the turn to the other seat.
 *
 * Only legal while the outgoing turn is being wrapped up.
 *
 * @throws Unless the phase is `end-turn`.
 */
export function passTurn<T>(state: GameState<T>): void {
  if (state.phase !== 'end-turn') {
    throw new Error(
      `Cannot pass the turn during "${state.phase}"; enter end-turn first`,
    );
  }
  state.currentPlayerIndex = otherIndex(state.currentPlayerIndex);
}

/**
 * Enter `start-turn` and bump the turn counter.
 *
 * @throws If `start-turn` is not reachable from the current phase.
 */
export function beginTurn<T>(state: GameState<T>): void {
  transitionTo(state, 'start-turn');
  state.turnNumber++;
}

/**
 * Transition the match to a new phase.
 *
 * Valid transitions:
 * - `init`       -> `mulligan` | `start-turn`
 * - `mulligan`   -> `start-turn`
 * - `start-turn` -> `main`
 * - `main`       -> `end-turn`
 * - `end-turn`   -> `start-turn`
 * - any non-terminal phase -> `game-over`
 *
 * @throws If the transition is invalid (e.g. `game-over` -> `main`).
 * @throws If transitioning to the same phase.
 */
export function transitionTo<T>(
  state: GameState<T>,
  newPhase: GamePhase,
): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Match is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, readonly GamePhase[]> = {
  init: ['mulligan', 'start-turn', 'game-over'],
  mulligan: ['start-turn', 'game-over'],
  'start-turn': ['main', 'game-over'],
  main: ['end-turn', 'game-over'],
  'end-turn': ['start-turn', 'game-over'],
  'game-over': [],
};

/** End the match. Convenience wrapper around `transitionTo`. */
export function endGame<T>(state: GameState<T>): void {
  transitionTo(state, 'game-over');
}
