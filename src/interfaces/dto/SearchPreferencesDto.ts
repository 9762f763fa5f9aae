import { z } from 'zod';
import { DATE_POSTED_OPTIONS, REMOTE_OPTIONS } from '../domain/SearchPreferences';

export const searchPreferencesSchema = z
  .object({
    title: z.string().trim().optional(),
    location: z.string().trim().optional(),
    company: z.string().trim().optional(),
    datePosted: z.enum(DATE_POSTED_OPTIONS).default('Last 30 days'),
    remote: z.enum(REMOTE_OPTIONS).default('Any')
  })
  .refine(prefs => Boolean(prefs.title || prefs.company), {
    message: 'Please enter either a job title or company name',
    path: ['title']
  });

export type SearchPreferencesDto = z.infer<typeof searchPreferencesSchema>;
