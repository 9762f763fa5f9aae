export interface CompensationRange {
  min?: number;
  max?: number;
  currency?: string;
}

export interface JobListing {
  id: string;
  title: string;
  requiredSkills: readonly string[];
  minExperience?: number;
  location?: string;
  compensation?: CompensationRange;
  /** Provider metadata, passed through to results untouched. */
  source?: Record<string, unknown>;
}
