/**
 * Ability and effect resolution.
 *
 * Effects pick their targets from a selector (`enemy-creatures`, `chosen`,
 * ...) and act on them through an EffectHost, which the Match implements so
 * damage and healing produce events and go through one code path.
 */

import type {
  AbilityDefinition,
  EffectDefinition,
  EffectTarget,
} from '../card-system/Card';
import type { EntityRef } from '../core-engine/GameEventEmitter';
import type { CreatureInstance } from './CreatureInstance';
import type { PlayerState } from './PlayerState';

export type ResolvedTarget =
  | { readonly kind: 'hero'; readonly player: PlayerState }
  | {
      readonly kind: 'creature';
      readonly creature: CreatureInstance;
      readonly owner: PlayerState;
    };

/** Match-side operations effects are applied through. */
export interface EffectHost {
  dealDamage(target: ResolvedTarget, amount: number, sourceId: string): number;
  heal(target: ResolvedTarget, amount: number, sourceId: string): number;
  drawCards(player: PlayerState, count: number): void;
  resolveRef(ref: EntityRef): ResolvedTarget | undefined;
}

export interface EffectContext {
  readonly controller: PlayerState;
  readonly opponent: PlayerState;
  /** Card id (spells) or instance id (creatures) credited with the effect. */
  readonly sourceId: string;
  readonly sourceCreature?: CreatureInstance;
  readonly chosenTarget?: EntityRef;
  /** Added to every damage effect (spell damage). */
  readonly damageBonus: number;
}

/** Spell damage granted by a player's creatures. */
export function spellDamageBonus(player: PlayerState): number {
  return player.battlefield.filter(
    (c) => c.isAlive && c.hasKeyword('spell-damage'),
  ).length;
}

export function toEntityRef(target: ResolvedTarget): EntityRef {
  return target.kind === 'hero'
    ? { kind: 'hero', playerId: target.player.id }
    : { kind: 'creature', instanceId: target.creature.instanceId };
}

function creaturesOf(player: PlayerState): ResolvedTarget[] {
  return player.battlefield
    .filter((creature) => creature.isAlive)
    .map((creature): ResolvedTarget => ({ kind: 'creature', creature, owner: player }));
}

/**
 * Resolve a target selector against the current board. A `chosen`
 * selector without a supplied target selects nothing.
 */
export function selectTargets(
  selector: EffectTarget,
  ctx: EffectContext,
  host: EffectHost,
): ResolvedTarget[] {
  switch (selector) {
    case 'chosen': {
      if (ctx.chosenTarget === undefined) return [];
      const target = host.resolveRef(ctx.chosenTarget);
      if (target === undefined) return [];
      if (target.kind === 'creature' && !target.creature.isAlive) return [];
      return [target];
    }
    case 'enemy-hero':
      return [{ kind: 'hero', player: ctx.opponent }];
    case 'friendly-hero':
      return [{ kind: 'hero', player: ctx.controller }];
    case 'enemy-creatures':
      return creaturesOf(ctx.opponent);
    case 'friendly-creatures':
      return creaturesOf(ctx.controller);
    case 'all-creatures':
      return [...creaturesOf(ctx.controller), ...creaturesOf(ctx.opponent)];
    case 'self': {
      const source = ctx.sourceCreature;
      if (source === undefined) {
        return [{ kind: 'hero', player: ctx.controller }];
      }
      if (!source.isAlive || ctx.controller.getCreature(source.instanceId) === undefined) {
        return [];
      }
      return [{ kind: 'creature', creature: source, owner: ctx.controller }];
    }
  }
}

function playersOf(targets: readonly ResolvedTarget[]): PlayerState[] {
  const players = targets.map((t) => (t.kind === 'hero' ? t.player : t.owner));
  return [...new Set(players)];
}

function creaturesIn(targets: readonly ResolvedTarget[]): CreatureInstance[] {
  const creatures: CreatureInstance[] = [];
  for (const target of targets) {
    if (target.kind === 'creature') creatures.push(target.creature);
  }
  return creatures;
}

export function applyEffect(
  effect: EffectDefinition,
  ctx: EffectContext,
  host: EffectHost,
): void {
  const targets = selectTargets(effect.target, ctx, host);

  switch (effect.type) {
    case 'damage':
      for (const target of targets) {
        host.dealDamage(target, effect.value + ctx.damageBonus, ctx.sourceId);
      }
      return;
    case 'heal':
      for (const target of targets) {
        host.heal(target, effect.value, ctx.sourceId);
      }
      return;
    case 'draw-card':
      for (const player of playersOf(targets)) {
        host.drawCards(player, effect.value);
      }
      return;
    case 'gain-mana':
      for (const player of playersOf(targets)) {
        player.gainMana(effect.value);
      }
      return;
    case 'buff-attack':
      for (const creature of creaturesIn(targets)) {
        creature.buffAttack(effect.value);
      }
      return;
    case 'buff-health':
      for (const creature of creaturesIn(targets)) {
        creature.buffHealth(effect.value);
      }
      return;
    case 'give-keyword':
      for (const creature of creaturesIn(targets)) {
        creature.addKeyword(effect.keyword);
      }
      return;
    case 'silence':
      for (const creature of creaturesIn(targets)) {
        creature.silence();
      }
      return;
    case 'freeze':
      for (const creature of creaturesIn(targets)) {
        creature.freeze();
      }
      return;
    case 'destroy':
      for (const creature of creaturesIn(targets)) {
        creature.destroy();
      }
      return;
  }
}

/** Apply every effect of an ability in order. */
export function resolveAbility(
  ability: AbilityDefinition,
  ctx: EffectContext,
  host: EffectHost,
): void {
  for (const effect of ability.effects) {
    applyEffect(effect, ctx, host);
  }
}
