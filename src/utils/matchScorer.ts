import type { CandidateProfile } from '../interfaces/domain/CandidateProfile';
import type { JobListing } from '../interfaces/domain/JobListing';
import type { MatchFactor, MatchResult, RankedMatches, SkippedListing } from '../interfaces/domain/MatchResult';
import type { ScoringConfig, SkillMatchMode } from '../interfaces/domain/ScoringConfig';
import { validateScoringConfig } from './scoringConfig';
import { InvalidInputError } from './errorHandler';

export function normalizeSkillName(rawName: string): string {
  return rawName
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9+.#/&()\s-]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/\s([#&+])/g, '$1')
    .trim();
}

export function normalizeLocation(location: string): string {
  return location.toLowerCase().replace(/\s+/g, ' ').trim();
}

function skillKey(skill: string, mode: SkillMatchMode): string {
  return mode === 'exact' ? skill.trim() : normalizeSkillName(skill);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function validateCandidate(candidate: CandidateProfile, mode: SkillMatchMode): void {
  if (!candidate.skills.some(skill => skillKey(skill, mode).length > 0)) {
    throw new InvalidInputError('Candidate profile must list at least one skill');
  }
  if (!Number.isFinite(candidate.yearsExperience) || candidate.yearsExperience < 0) {
    throw new InvalidInputError('Candidate years of experience must be a non-negative number');
  }
}

function validateJob(job: JobListing): void {
  if (typeof job.id !== 'string' || job.id.trim().length === 0) {
    throw new InvalidInputError('Job listing is missing an id');
  }
  const minExperience = job.minExperience ?? 0;
  if (!Number.isFinite(minExperience) || minExperience < 0) {
    throw new InvalidInputError(`Job listing ${job.id} has an invalid minimum experience`);
  }
}

interface SkillOverlap {
  overlap: number;
  matched: string[];
  missing: string[];
}

function computeSkillOverlap(
  candidateSkills: readonly string[],
  requiredSkills: readonly string[],
  mode: SkillMatchMode
): SkillOverlap {
  const candidateKeys = new Set(
    candidateSkills.map(skill => skillKey(skill, mode)).filter(key => key.length > 0)
  );

  // Required skills that collapse to the same key count once
  const required = new Map<string, string>();
  for (const skill of requiredSkills) {
    const key = skillKey(skill, mode);
    if (!key || required.has(key)) {
      continue;
    }
    required.set(key, skill.trim());
  }

  const matched: string[] = [];
  const missing: string[] = [];
  for (const [key, name] of required.entries()) {
    if (candidateKeys.has(key)) {
      matched.push(name);
    } else {
      missing.push(name);
    }
  }

  return {
    overlap: matched.length / Math.max(1, required.size),
    matched,
    missing
  };
}

function experienceFactor(yearsExperience: number, minExperience: number): number {
  if (yearsExperience >= minExperience) {
    return 1;
  }
  return clamp(yearsExperience / Math.max(1, minExperience), 0, 1);
}

function locationMatches(desiredLocations: readonly string[], jobLocation: string | undefined): boolean {
  const desired = desiredLocations.map(normalizeLocation).filter(location => location.length > 0);
  if (desired.length === 0) {
    return true;
  }
  return jobLocation !== undefined && desired.includes(normalizeLocation(jobLocation));
}

function scoreValidated(candidate: CandidateProfile, job: JobListing, config: ScoringConfig): MatchResult {
  validateJob(job);

  const skills = computeSkillOverlap(candidate.skills, job.requiredSkills, config.skillMatchMode);
  const requiredCount = skills.matched.length + skills.missing.length;

  const minExperience = job.minExperience ?? 0;
  const experience = experienceFactor(candidate.yearsExperience, minExperience);

  const location = locationMatches(candidate.desiredLocations, job.location) ? 1 : 0;

  const breakdown: MatchFactor[] = [
    {
      name: 'skills',
      factor: skills.overlap,
      weight: config.skillWeight,
      contribution: skills.overlap * config.skillWeight * 100,
      detail: requiredCount === 0
        ? 'No required skills listed'
        : `Matches ${skills.matched.length}/${requiredCount} required skills`
    },
    {
      name: 'experience',
      factor: experience,
      weight: config.experienceWeight,
      contribution: experience * config.experienceWeight * 100,
      detail: `${candidate.yearsExperience} years against ${minExperience} required`
    },
    {
      name: 'location',
      factor: location,
      weight: config.locationWeight,
      contribution: location * config.locationWeight * 100,
      detail: describeLocation(candidate.desiredLocations, job.location, location === 1)
    }
  ];

  const total = breakdown.reduce((sum, entry) => sum + entry.contribution, 0);

  return {
    jobId: job.id,
    score: clamp(Math.round(total), 0, 100),
    breakdown,
    matchedSkills: skills.matched,
    missingSkills: skills.missing
  };
}

function describeLocation(desiredLocations: readonly string[], jobLocation: string | undefined, matched: boolean): string {
  if (desiredLocations.every(location => normalizeLocation(location).length === 0)) {
    return 'Any location accepted';
  }
  if (!jobLocation) {
    return 'Job location not specified';
  }
  return matched
    ? `${jobLocation} is a desired location`
    : `${jobLocation} is not a desired location`;
}

/**
 * Scores one job listing against a candidate profile.
 *
 * The result is a pure function of its arguments. Breakdown entries are
 * unrounded and always appear in the order skills, experience, location.
 *
 * @throws InvalidInputError when the candidate has no skills or the job has no id
 * @throws InvalidConfigError when weights are negative or do not sum to 1.0
 */
export function score(candidate: CandidateProfile, job: JobListing, config: ScoringConfig): MatchResult {
  const validConfig = validateScoringConfig(config);
  validateCandidate(candidate, validConfig.skillMatchMode);
  return scoreValidated(candidate, job, validConfig);
}

/**
 * Scores every listing and orders the results by descending score. Equal
 * scores keep their input order. Listings that fail validation are left out
 * of `results` and reported in `skipped`; candidate and config errors throw.
 */
export function rankDetailed(
  candidate: CandidateProfile,
  jobs: readonly JobListing[],
  config: ScoringConfig
): RankedMatches {
  const validConfig = validateScoringConfig(config);
  validateCandidate(candidate, validConfig.skillMatchMode);

  const scored: Array<{ result: MatchResult; index: number }> = [];
  const skipped: SkippedListing[] = [];

  jobs.forEach((job, index) => {
    try {
      scored.push({ result: scoreValidated(candidate, job, validConfig), index });
    } catch (error) {
      if (!(error instanceof InvalidInputError)) {
        throw error;
      }
      skipped.push({
        index,
        jobId: typeof job.id === 'string' && job.id.trim().length > 0 ? job.id : null,
        reason: error.message
      });
    }
  });

  scored.sort((a, b) => b.result.score - a.result.score || a.index - b.index);

  return {
    results: scored.map(entry => entry.result),
    skipped
  };
}

export function rank(candidate: CandidateProfile, jobs: readonly JobListing[], config: ScoringConfig): MatchResult[] {
  return rankDetailed(candidate, jobs, config).results;
}
