import { z } from 'zod';

// Emptiness and range checks are left to the scorer so they surface as InvalidInputError.
export const candidateProfileSchema = z.object({
  skills: z.array(z.string()),
  yearsExperience: z.number(),
  desiredTitles: z.array(z.string()).default([]),
  desiredLocations: z.array(z.string()).default([]),
  minCompensation: z.number().nonnegative().optional()
});

export type CandidateProfileDto = z.infer<typeof candidateProfileSchema>;
