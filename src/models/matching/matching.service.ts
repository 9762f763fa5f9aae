import type { ZodError } from 'zod';
import type { JobListing } from '../../interfaces/domain/JobListing';
import type { MatchResult, RankedMatches, SkippedListing } from '../../interfaces/domain/MatchResult';
import type { ScoringConfig } from '../../interfaces/domain/ScoringConfig';
import type { SessionContext } from '../../interfaces/domain/SessionContext';
import { jobListingSchema } from '../../interfaces/dto/JobListingDto';
import type { MatchFilterDto, RankRequestDto, ScoreRequestDto } from '../../interfaces/dto/MatchRequestDto';
import { rankDetailed, score, normalizeLocation } from '../../utils/matchScorer';
import { resolveScoringConfig } from '../../utils/scoringConfig';
import type { ScoringConfigOverrides } from '../../utils/scoringConfig';
import { AppError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';

export interface SessionMatch extends MatchResult {
  job: JobListing;
}

export interface SessionMatches {
  total: number;
  results: SessionMatch[];
  skipped: SkippedListing[];
}

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function normalizedFilter(values: string[]): string[] {
  return values.map(normalizeLocation).filter(value => value.length > 0);
}

function remoteTypeOf(job: JobListing): string {
  const value = job.source?.remoteType;
  return typeof value === 'string' ? normalizeLocation(value) : '';
}

export class MatchingService {
  constructor(private readonly baseConfig: ScoringConfig) {}

  /** Applies request overrides on top of the service-wide scoring config. */
  resolveConfig(overrides?: ScoringConfigOverrides): ScoringConfig {
    return resolveScoringConfig({
      skillWeight: overrides?.skillWeight ?? this.baseConfig.skillWeight,
      experienceWeight: overrides?.experienceWeight ?? this.baseConfig.experienceWeight,
      locationWeight: overrides?.locationWeight ?? this.baseConfig.locationWeight,
      skillMatchMode: overrides?.skillMatchMode ?? this.baseConfig.skillMatchMode
    });
  }

  scoreOne(dto: ScoreRequestDto): MatchResult {
    return score(dto.candidate, dto.job, this.resolveConfig(dto.config));
  }

  rankListings(dto: RankRequestDto): RankedMatches {
    const config = this.resolveConfig(dto.config);

    const valid: JobListing[] = [];
    const originalIndex: number[] = [];
    const malformed: SkippedListing[] = [];

    dto.jobs.forEach((item, index) => {
      const parsed = jobListingSchema.safeParse(item);
      if (parsed.success) {
        valid.push(parsed.data);
        originalIndex.push(index);
        return;
      }
      const rawId = typeof item === 'object' && item !== null && 'id' in item ? item.id : undefined;
      malformed.push({
        index,
        jobId: typeof rawId === 'string' && rawId.length > 0 ? rawId : null,
        reason: `Malformed job listing: ${describeIssue(parsed.error)}`
      });
    });

    const ranked = rankDetailed(dto.candidate, valid, config);
    const skipped = [
      ...malformed,
      ...ranked.skipped.map(entry => ({ ...entry, index: originalIndex[entry.index] }))
    ].sort((a, b) => a.index - b.index);

    if (skipped.length > 0) {
      logger.warn('Skipped job listings while ranking', { skipped: skipped.length, ranked: ranked.results.length });
    }

    return { results: ranked.results, skipped };
  }

  /** Ranks the session's fetched jobs against its profile, then filters. */
  sessionMatches(session: SessionContext, filter: MatchFilterDto): SessionMatches {
    if (!session.profile) {
      throw new AppError('No candidate profile in session; upload a resume or set a profile first', 404);
    }

    // Results are joined back to their listing by id, so the first listing wins
    const jobsById = new Map<string, JobListing>();
    for (const job of session.jobs) {
      if (!jobsById.has(job.id)) {
        jobsById.set(job.id, job);
      }
    }

    const ranked = rankDetailed(session.profile, [...jobsById.values()], this.baseConfig);
    const locations = normalizedFilter(filter.location);
    const remoteTypes = normalizedFilter(filter.remote);

    const results: SessionMatch[] = [];
    for (const result of ranked.results) {
      const job = jobsById.get(result.jobId);
      if (!job || result.score < filter.minScore) {
        continue;
      }
      if (locations.length > 0 && !(job.location && locations.includes(normalizeLocation(job.location)))) {
        continue;
      }
      if (remoteTypes.length > 0 && !remoteTypes.includes(remoteTypeOf(job))) {
        continue;
      }
      results.push({ ...result, job });
    }

    return {
      total: ranked.results.length,
      results,
      skipped: ranked.skipped
    };
  }
}
