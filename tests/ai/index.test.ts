import { describe, it, expect } from 'vitest';
import {
  AI_DIFFICULTIES,
  DIFFICULTY_PROFILES,
  STRATEGIES,
  STRATEGY_NAMES,
  isAiDifficulty,
  AiDecisionEngine,
} from '../../src/ai/index';

describe('ai barrel exports', () => {
  it('should export a profile per difficulty', () => {
    expect(AI_DIFFICULTIES).toEqual(['easy', 'medium', 'hard', 'expert']);
    expect(AI_DIFFICULTIES.map((d) => DIFFICULTY_PROFILES[d].thinkingTimeMs)).toEqual([
      500, 1000, 1500, 2000,
    ]);
    expect(AI_DIFFICULTIES.map((d) => DIFFICULTY_PROFILES[d].mistakeChance)).toEqual([
      0.3, 0.15, 0.05, 0,
    ]);
  });

  it('should export a strategy per name', () => {
    expect(Object.keys(STRATEGIES)).toEqual([...STRATEGY_NAMES]);
  });

  it('should recognise difficulty names', () => {
    expect(isAiDifficulty('hard')).toBe(true);
    expect(isAiDifficulty('impossible')).toBe(false);
  });

  it('should export the decision engine', () => {
    expect(new AiDecisionEngine('p').playerId).toBe('p');
  });
});
