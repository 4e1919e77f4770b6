/**
 * Match rules configuration.
 *
 * A RulesConfig holds the numeric limits of a match. Overrides are
 * validated with zod, so a bad configuration fails at construction
 * instead of halfway through a game.
 */

import { z } from 'zod';

export interface RulesConfig {
  readonly startingHealth: number;
  readonly maxMana: number;
  readonly handLimit: number;
  readonly battlefieldLimit: number;
  readonly initialHandSize: number;
  readonly skipMulligan: boolean;
  /** Skip the draw on the very first turn of the game. */
  readonly skipFirstDraw: boolean;
}

const positiveInt = z.number().int().positive();

export const rulesConfigSchema = z
  .object({
    startingHealth: positiveInt.default(30),
    // Limits may be lowered for variants but never raised past the standard caps.
    maxMana: positiveInt.max(10).default(10),
    handLimit: positiveInt.max(10).default(10),
    battlefieldLimit: positiveInt.max(7).default(7),
    initialHandSize: z.number().int().nonnegative().default(3),
    skipMulligan: z.boolean().default(false),
    skipFirstDraw: z.boolean().default(true),
  })
  .strict()
  .refine((rules) => rules.initialHandSize <= rules.handLimit, {
    message: 'initialHandSize cannot exceed handLimit',
    path: ['initialHandSize'],
  });

/**
 * Build a rules configuration from defaults plus overrides.
 *
 * @throws ZodError if an override is out of range or unknown.
 */
export function createRulesConfig(
  overrides: Partial<RulesConfig> = {},
): RulesConfig {
  return Object.freeze(rulesConfigSchema.parse(overrides));
}

export const DEFAULT_RULES: RulesConfig = createRulesConfig();
