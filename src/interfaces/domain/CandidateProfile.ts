export interface CandidateProfile {
  skills: readonly string[];
  yearsExperience: number;
  desiredTitles: readonly string[];
  /** Empty means the candidate accepts any location. */
  desiredLocations: readonly string[];
  minCompensation?: number;
}
