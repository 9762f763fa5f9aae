import { z } from 'zod';
import type { ScoringConfig } from '../interfaces/domain/ScoringConfig';
import { InvalidConfigError } from './errorHandler';

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = {
  skillWeight: 0.6,
  experienceWeight: 0.25,
  locationWeight: 0.15,
  skillMatchMode: 'normalized'
};

export const WEIGHT_SUM_TOLERANCE = 0.001;

const weightSchema = z.number().finite().nonnegative();

const scoringConfigSchema = z.object({
  skillWeight: weightSchema,
  experienceWeight: weightSchema,
  locationWeight: weightSchema,
  skillMatchMode: z.enum(['exact', 'normalized'])
});

export interface ScoringConfigOverrides {
  skillWeight?: number;
  experienceWeight?: number;
  locationWeight?: number;
  skillMatchMode?: string;
}

export function validateScoringConfig(config: unknown): ScoringConfig {
  const parsed = scoringConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConfigError(`Invalid scoring config: ${issue.path.join('.') || 'config'} ${issue.message}`);
  }

  const { skillWeight, experienceWeight, locationWeight } = parsed.data;
  const total = skillWeight + experienceWeight + locationWeight;
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InvalidConfigError(`Scoring weights must sum to 1.0, got ${Number(total.toFixed(6))}`);
  }

  return parsed.data;
}

/** Fills unset options from the defaults and validates the result. */
export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  return validateScoringConfig({
    skillWeight: overrides.skillWeight ?? DEFAULT_SCORING_CONFIG.skillWeight,
    experienceWeight: overrides.experienceWeight ?? DEFAULT_SCORING_CONFIG.experienceWeight,
    locationWeight: overrides.locationWeight ?? DEFAULT_SCORING_CONFIG.locationWeight,
    skillMatchMode: overrides.skillMatchMode ?? DEFAULT_SCORING_CONFIG.skillMatchMode
  });
}
