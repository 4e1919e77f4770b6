import { describe, it, expect } from 'vitest';
import type { Keyword } from '../../src/card-system/Card';
import { CreatureInstance } from '../../src/rule-engine/CreatureInstance';
import { testCreature } from '../helpers/fixtures';

function creature(
  attack: number,
  health: number,
  keywords: readonly Keyword[] = [],
): CreatureInstance {
  return new CreatureInstance(testCreature('unit', attack, health, { keywords }), 'unit#1', 'alice');
}

/** A creature that has been on the board since last turn. */
function readyCreature(attack: number, health: number, keywords: readonly Keyword[] = []) {
  const instance = creature(attack, health, keywords);
  instance.startTurn();
  return instance;
}

describe('CreatureInstance', () => {
  describe('summoning', () => {
    it('should copy stats from the card', () => {
      const unit = creature(3, 2);
      expect([unit.attack, unit.health, unit.maxHealth]).toEqual([3, 2, 2]);
      expect([unit.baseAttack, unit.baseHealth]).toEqual([3, 2]);
      expect(unit.cardId).toBe('unit');
      expect(unit.ownerId).toBe('alice');
    });

    it('should have summoning sickness', () => {
      const unit = creature(3, 2);
      expect(unit.state).toBe('summoned');
      expect(unit.canAttack()).toBe(false);
    });

    it('should be ready at once with charge', () => {
      const unit = creature(3, 1, ['charge']);
      expect(unit.state).toBe('ready');
      expect(unit.canAttack()).toBe(true);
    });

    it('should be ready after its owner starts a turn', () => {
      expect(readyCreature(3, 2).canAttack()).toBe(true);
    });
  });

  describe('declareAttack', () => {
    it('should allow one attack per turn', () => {
      const unit = readyCreature(3, 2);
      expect(unit.declareAttack()).toBe(true);
      expect(unit.state).toBe('attacked');
      expect(unit.declareAttack()).toBe(false);
      expect(unit.timesAttackedThisTurn).toBe(1);
    });

    it('should allow two attacks with windfury', () => {
      const unit = readyCreature(4, 4, ['windfury']);
      expect(unit.declareAttack()).toBe(true);
      expect(unit.state).toBe('ready');
      expect(unit.declareAttack()).toBe(true);
      expect(unit.state).toBe('attacked');
      expect(unit.declareAttack()).toBe(false);
    });

    it('should break stealth', () => {
      const unit = readyCreature(2, 2, ['stealth']);
      unit.declareAttack();
      expect(unit.hasKeyword('stealth')).toBe(false);
    });

    it('should reset at the next turn start', () => {
      const unit = readyCreature(3, 2);
      unit.declareAttack();
      unit.startTurn();
      expect(unit.timesAttackedThisTurn).toBe(0);
      expect(unit.canAttack()).toBe(true);
    });
  });

  describe('freeze', () => {
    it('should stop attacks this turn', () => {
      const unit = readyCreature(3, 2);
      unit.freeze();
      expect(unit.canAttack()).toBe(false);
    });

    it('should thaw into an exhausted turn and recover the turn after', () => {
      const unit = readyCreature(3, 2);
      unit.freeze();

      unit.startTurn();
      expect(unit.frozen).toBe(false);
      expect(unit.state).toBe('exhausted');
      expect(unit.canAttack()).toBe(false);

      unit.startTurn();
      expect(unit.state).toBe('ready');
      expect(unit.canAttack()).toBe(true);
    });
  });

  describe('takeDamage', () => {
    it('should clamp damage to remaining health', () => {
      const unit = creature(2, 3);
      expect(unit.takeDamage(10)).toBe(3);
      expect(unit.health).toBe(0);
      expect(unit.isAlive).toBe(false);
    });

    it('should ignore non-positive damage', () => {
      const unit = creature(2, 3);
      expect(unit.takeDamage(0)).toBe(0);
      expect(unit.takeDamage(-2)).toBe(0);
      expect(unit.health).toBe(3);
    });

    it('should absorb exactly one hit with divine shield', () => {
      const unit = creature(3, 5, ['divine-shield']);

      expect(unit.takeDamage(1)).toBe(0);
      expect(unit.health).toBe(5);
      expect(unit.hasKeyword('divine-shield')).toBe(false);

      expect(unit.takeDamage(5)).toBe(5);
      expect(unit.health).toBe(0);
      expect(unit.isAlive).toBe(false);
    });

    it('should track damage taken this turn', () => {
      const unit = creature(1, 5);
      unit.takeDamage(2);
      unit.takeDamage(1);
      expect(unit.damageTakenThisTurn).toBe(3);
    });
  });

  describe('heal', () => {
    it('should not heal past max health', () => {
      const unit = creature(2, 5);
      unit.takeDamage(3);
      expect(unit.heal(10)).toBe(3);
      expect(unit.health).toBe(5);
    });

    it('should not heal a dead creature', () => {
      const unit = creature(2, 1);
      unit.destroy();
      expect(unit.heal(3)).toBe(0);
    });
  });

  describe('buffs', () => {
    it('should raise max and current health together', () => {
      const unit = creature(2, 2);
      unit.buffHealth(3);
      expect([unit.health, unit.maxHealth]).toEqual([5, 5]);
    });

    it('should revert a temporary buff when it expires', () => {
      const unit = creature(2, 2);
      unit.buffAttack(2, 1);
      expect(unit.attack).toBe(4);

      unit.startTurn();
      expect(unit.attack).toBe(2);
      expect(unit.modifiers).toEqual([]);
    });

    it('should keep a temporary buff until its last turn', () => {
      const unit = creature(2, 2);
      unit.buffHealth(3, 2);

      unit.startTurn();
      expect(unit.maxHealth).toBe(5);

      unit.startTurn();
      expect(unit.maxHealth).toBe(2);
      expect(unit.health).toBe(2);
    });

    it('should never drop attack below zero', () => {
      const unit = creature(1, 2);
      unit.buffAttack(-3);
      expect(unit.attack).toBe(0);
    });
  });

  describe('silence', () => {
    it('should revert a temporary health buff', () => {
      const unit = creature(2, 2);
      unit.buffHealth(3, 2);
      expect([unit.attack, unit.health, unit.maxHealth]).toEqual([2, 5, 5]);

      unit.silence();

      expect([unit.attack, unit.health, unit.maxHealth]).toEqual([2, 2, 2]);
      expect(unit.modifiers).toEqual([]);
      expect(unit.silenced).toBe(true);
    });

    it('should keep damage already taken', () => {
      const unit = creature(2, 4);
      unit.buffHealth(2);
      unit.takeDamage(3);
      unit.silence();
      expect([unit.health, unit.maxHealth]).toEqual([3, 4]);
    });

    it('should strip keywords and abilities', () => {
      const card = testCreature('knight', 3, 3, {
        keywords: ['taunt', 'divine-shield'],
        abilities: [
          {
            id: 'knight_deathrattle',
            name: 'Last Stand',
            trigger: 'deathrattle',
            effects: [{ type: 'damage', value: 2, target: 'enemy-hero' }],
          },
        ],
      });
      const unit = new CreatureInstance(card, 'knight#1', 'alice');

      unit.silence();

      expect(unit.keywords.size).toBe(0);
      expect(unit.abilities).toEqual([]);
      expect(card.keywords).toEqual(['taunt', 'divine-shield']);
    });
  });
});
