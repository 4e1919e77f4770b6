/**
 * Rule Engine Module
 *
 * The authoritative match state machine: creatures, players, effects,
 * intents, snapshots, match setup and transcripts.
 */

export type { CreatureState, ModifiedStat, StatModifier } from './CreatureInstance';
export { CreatureInstance } from './CreatureInstance';

export type { DrawResult, EquippedWeapon, PlayerStateOptions } from './PlayerState';
export { PlayerState } from './PlayerState';

export type { ResolvedTarget, EffectHost, EffectContext } from './Effects';
export {
  spellDamageBonus,
  toEntityRef,
  selectTargets,
  applyEffect,
  resolveAbility,
} from './Effects';

export type {
  AttackTarget,
  PlayCardIntent,
  AttackIntent,
  EndTurnIntent,
  ConcedeIntent,
  MulliganIntent,
  Intent,
  IntentType,
  RejectionCode,
  IntentResult,
  DefenderInfo,
  LegalAttackTargets,
} from './Intents';
export { ACCEPTED, reject, legalAttackTargets, isLegalAttackTarget } from './Intents';

export type {
  CreatureSnapshot,
  WeaponSnapshot,
  PlayerSnapshot,
  MatchSnapshot,
} from './MatchSnapshot';
export {
  snapshotCreature,
  snapshotPlayer,
  playerInSnapshot,
  opponentInSnapshot,
} from './MatchSnapshot';

export type { MatchPlayerSetup, MatchOptions, IntentListener } from './Match';
export { Match, InvalidDeckError } from './Match';

export type { StartGameOptions, StartGameResult } from './createMatch';
export {
  startGame,
  HUMAN_PLAYER_ID,
  AI_PLAYER_ID,
  DEFAULT_PLAYER_DECK_ID,
} from './createMatch';

export type {
  MatchTranscript,
  TranscriptPlayer,
  TranscriptEntry,
  TranscriptResult,
  TranscriptSetup,
  ReplayOptions,
  TurnSummary,
} from './MatchTranscript';
export {
  MatchTranscriptRecorder,
  matchTranscriptSchema,
  parseTranscript,
  replayTranscript,
  summarizeTurns,
} from './MatchTranscript';
