import { z } from 'zod';

export const jobListingSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  requiredSkills: z.array(z.string()).default([]),
  minExperience: z.number().optional(),
  location: z.string().optional(),
  compensation: z
    .object({
      min: z.number().optional(),
      max: z.number().optional(),
      currency: z.string().optional()
    })
    .optional(),
  source: z.record(z.unknown()).optional()
});

export type JobListingDto = z.infer<typeof jobListingSchema>;
