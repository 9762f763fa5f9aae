import { env } from './env';
import { resolveScoringConfig } from '../utils/scoringConfig';

export const scoringConfig = resolveScoringConfig({
  skillWeight: env.SCORING_SKILL_WEIGHT,
  experienceWeight: env.SCORING_EXPERIENCE_WEIGHT,
  locationWeight: env.SCORING_LOCATION_WEIGHT,
  skillMatchMode: env.SCORING_SKILL_MATCH_MODE
});
