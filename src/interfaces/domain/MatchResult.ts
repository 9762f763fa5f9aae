export type MatchFactorName = 'skills' | 'experience' | 'location';

export interface MatchFactor {
  name: MatchFactorName;
  /** Raw factor in [0, 1] before weighting. */
  factor: number;
  weight: number;
  /** Points added to the unrounded score. */
  contribution: number;
  detail: string;
}

export interface MatchResult {
  jobId: string;
  score: number;
  breakdown: MatchFactor[];
  matchedSkills: string[];
  missingSkills: string[];
}

export interface SkippedListing {
  index: number;
  jobId: string | null;
  reason: string;
}

export interface RankedMatches {
  results: MatchResult[];
  skipped: SkippedListing[];
}
