/**
 * Headless driver that plays the AI's side of a match.
 *
 * Loops snapshot -> decide -> submit until the AI ends its turn. A stale
 * decision the Match rejects is logged and replaced by ending the turn.
 */

import { createLogger, type Logger } from '../core-engine/Logger';
import type { Match } from '../rule-engine/Match';
import type { AiDecision, AiDecisionEngine } from './AiDecisionEngine';

export interface AiTurnOptions {
  /** Maximum intents per turn before the driver ends it (defaults to 50). */
  maxSteps?: number;
  logger?: Logger;
}

export interface AiTurnResult {
  readonly decisions: readonly AiDecision[];
  /** Whether the driver handed the turn over (or the game ended). */
  readonly turnEnded: boolean;
  readonly mulliganed: boolean;
}

/**
 * Submit the AI's mulligan if the match is waiting for it.
 *
 * @returns true if a mulligan was submitted.
 */
export function playAiMulligan(match: Match, engine: AiDecisionEngine): boolean {
  const player = match.getPlayer(engine.playerId);
  if (match.phase !== 'mulligan' || player === undefined || match.hasMulliganed(engine.playerId)) {
    return false;
  }
  return match.mulligan(engine.playerId, engine.chooseMulligan(player.hand)).ok;
}

/** Play the AI's current turn (or mulligan) to completion. */
export function playAiTurn(
  match: Match,
  engine: AiDecisionEngine,
  options: AiTurnOptions = {},
): AiTurnResult {
  const { maxSteps = 50 } = options;
  const logger = options.logger?.child('AiTurn') ?? createLogger({ tag: 'AiTurn' });
  const decisions: AiDecision[] = [];

  if (match.phase === 'mulligan') {
    return { decisions, turnEnded: false, mulliganed: playAiMulligan(match, engine) };
  }

  const isMyTurn = (): boolean =>
    !match.isGameOver &&
    match.phase === 'main' &&
    match.getActivePlayer().id === engine.playerId;

  if (!isMyTurn()) {
    return { decisions, turnEnded: false, mulliganed: false };
  }

  for (let step = 0; step < maxSteps && isMyTurn(); step++) {
    const decision = engine.decide(match.snapshot());
    decisions.push(decision);

    const result = match.submit(engine.playerId, decision.intent);
    if (!result.ok) {
      logger.warn(`Decision rejected (${result.code}): ${result.message}; ending turn`);
      break;
    }
    if (decision.intent.type === 'end-turn') {
      return { decisions, turnEnded: true, mulliganed: false };
    }
  }

  if (isMyTurn()) {
    match.endTurn(engine.playerId);
  }
  return { decisions, turnEnded: true, mulliganed: false };
}
