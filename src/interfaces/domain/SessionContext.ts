import type { CandidateProfile } from './CandidateProfile';
import type { JobListing } from './JobListing';
import type { ResumeAnalysis } from './ResumeAnalysis';
import type { SearchPreferences } from './SearchPreferences';

export interface SessionContext {
  id: string;
  analysis: ResumeAnalysis | null;
  profile: CandidateProfile | null;
  preferences: SearchPreferences | null;
  jobs: JobListing[];
  lastAccessedAt: number;
}
