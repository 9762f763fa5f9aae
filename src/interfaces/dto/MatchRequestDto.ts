import { z } from 'zod';
import { candidateProfileSchema } from './CandidateProfileDto';
import { jobListingSchema } from './JobListingDto';

export const scoringConfigOverridesSchema = z.object({
  skillWeight: z.number().optional(),
  experienceWeight: z.number().optional(),
  locationWeight: z.number().optional(),
  skillMatchMode: z.string().optional()
});

export const scoreRequestSchema = z.object({
  candidate: candidateProfileSchema,
  job: jobListingSchema,
  config: scoringConfigOverridesSchema.optional()
});

// Jobs are validated one by one so a malformed listing is skipped, not fatal.
export const rankRequestSchema = z.object({
  candidate: candidateProfileSchema,
  jobs: z.array(z.unknown()),
  config: scoringConfigOverridesSchema.optional()
});

// Query filters may be given once or repeated (`?location=a&location=b`).
const repeatable = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

export const matchFilterSchema = z.object({
  minScore: z.coerce.number().min(0).max(100).default(0),
  location: repeatable,
  remote: repeatable
});

export type ScoreRequestDto = z.infer<typeof scoreRequestSchema>;
export type RankRequestDto = z.infer<typeof rankRequestSchema>;
export type MatchFilterDto = z.infer<typeof matchFilterSchema>;
