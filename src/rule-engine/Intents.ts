/**
 * Intents: the actions a driver (human input or the AI) submits to a
 * Match, and the results the Match answers with.
 */

import type { EntityRef } from '../core-engine/GameEventEmitter';

export type AttackTarget =
  | { readonly kind: 'face' }
  | { readonly kind: 'creature'; readonly instanceId: string };

export interface PlayCardIntent {
  readonly type: 'play-card';
  readonly cardId: string;
  /** Target for effects aimed at a `chosen` entity. */
  readonly target?: EntityRef;
  /** Board slot for creatures; defaults to the right end. */
  readonly position?: number;
}

export interface AttackIntent {
  readonly type: 'attack';
  readonly attackerId: string;
  readonly target: AttackTarget;
}

export interface EndTurnIntent {
  readonly type: 'end-turn';
}

export interface ConcedeIntent {
  readonly type: 'concede';
}

export interface MulliganIntent {
  readonly type: 'mulligan';
  /** Hand positions to send back and redraw. */
  readonly replace: readonly number[];
}

export type Intent =
  | PlayCardIntent
  | AttackIntent
  | EndTurnIntent
  | ConcedeIntent
  | MulliganIntent;

export type IntentType = Intent['type'];

export type RejectionCode =
  | 'game-over'
  | 'wrong-phase'
  | 'not-your-turn'
  | 'unknown-player'
  | 'card-not-in-hand'
  | 'insufficient-mana'
  | 'battlefield-full'
  | 'unknown-attacker'
  | 'cannot-attack'
  | 'invalid-target'
  | 'already-mulliganed'
  | 'invalid-mulligan';

export type IntentResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly code: RejectionCode; readonly message: string };

export const ACCEPTED: IntentResult = Object.freeze({ ok: true });

export function reject(code: RejectionCode, message: string): IntentResult {
  return { ok: false, code, message };
}

// ── Attack targeting ────────────────────────────────────────

/** What targeting rules need to know about a defending creature. */
export interface DefenderInfo {
  readonly instanceId: string;
  readonly taunt: boolean;
  readonly stealth: boolean;
}

export interface LegalAttackTargets {
  readonly faceAllowed: boolean;
  readonly creatureIds: readonly string[];
}

/**
 * Who may be attacked. Stealthed creatures are never targetable; if any
 * visible Taunt creature stands, only those are.
 */
export function legalAttackTargets(
  defenders: readonly DefenderInfo[],
): LegalAttackTargets {
  const visible = defenders.filter((d) => !d.stealth);
  const taunts = visible.filter((d) => d.taunt);
  if (taunts.length > 0) {
    return { faceAllowed: false, creatureIds: taunts.map((d) => d.instanceId) };
  }
  return { faceAllowed: true, creatureIds: visible.map((d) => d.instanceId) };
}

export function isLegalAttackTarget(
  target: AttackTarget,
  legal: LegalAttackTargets,
): boolean {
  return target.kind === 'face'
    ? legal.faceAllowed
    : legal.creatureIds.includes(target.instanceId);
}
