import { z } from 'zod';
import type { JobListing } from '../interfaces/domain/JobListing';
import type { ResumeAnalysis } from '../interfaces/domain/ResumeAnalysis';
import type { SearchPreferences } from '../interfaces/domain/SearchPreferences';
import { AppError } from './errorHandler';
import { logger } from './logger';

export interface ConnectionStatus {
  success: boolean;
  message: string;
}

export interface JobSource {
  searchJobs(preferences: SearchPreferences, analysis?: ResumeAnalysis | null): Promise<JobListing[]>;
  testConnection(): Promise<ConnectionStatus>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TheirStackOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface TheirStackQuery {
  posted_at_max_age_days: number;
  company_name_or?: string[];
  job_title_contains_any?: string[];
  location_contains_any?: string[];
  remote?: boolean;
  technologies_contains_any?: string[];
  seniority_contains_any?: string[];
}

const MAX_AGE_DAYS: Record<string, number> = {
  'Last 24 hours': 1,
  'Last 7 days': 7,
  'Last 30 days': 30
};
const DEFAULT_MAX_AGE_DAYS = 90;

// Listings rarely state years of experience; seniority is the closest signal.
const SENIORITY_MIN_YEARS: Record<string, number> = {
  entry: 0,
  junior: 1,
  mid: 3,
  mid_level: 3,
  senior: 5,
  staff: 8,
  lead: 8,
  principal: 10
};

/**
 * Translates search preferences into the job API's filter format. The API
 * requires at least one of its mandatory filters, so the posting age is
 * always sent.
 */
export function formatSearchQuery(preferences: SearchPreferences, analysis?: ResumeAnalysis | null): TheirStackQuery {
  const query: TheirStackQuery = {
    posted_at_max_age_days: MAX_AGE_DAYS[preferences.datePosted] ?? DEFAULT_MAX_AGE_DAYS
  };

  const company = preferences.company?.trim();
  if (company) {
    query.company_name_or = [company];
  }

  const title = preferences.title?.trim();
  if (title) {
    query.job_title_contains_any = [title];
  }

  const location = preferences.location?.trim();
  if (location) {
    query.location_contains_any = [location];
  }

  if (preferences.remote === 'Remote only') {
    query.remote = true;
  }

  if (analysis && analysis.technicalSkills.length > 0) {
    query.technologies_contains_any = analysis.technicalSkills;
  }

  if (analysis?.seniorityLevel) {
    query.seniority_contains_any = [analysis.seniorityLevel];
  }

  return query;
}

const optionalString = z.string().nullish().catch(null);
const optionalNumber = z.number().finite().nullish().catch(null);

const rawJobSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  job_title: optionalString,
  title: optionalString,
  company: optionalString,
  location: optionalString,
  short_location: optionalString,
  remote: z.boolean().nullish().catch(null),
  hybrid: z.boolean().nullish().catch(null),
  remote_type: optionalString,
  url: optionalString,
  apply_url: optionalString,
  date_posted: optionalString,
  description: optionalString,
  seniority: optionalString,
  min_experience: optionalNumber,
  required_skills: z.array(z.string()).nullish().catch(null),
  technology_slugs: z.array(z.string()).nullish().catch(null),
  min_annual_salary: optionalNumber,
  max_annual_salary: optionalNumber,
  salary_currency: optionalString
});

type RawJob = z.infer<typeof rawJobSchema>;

function remoteType(raw: RawJob): string | null {
  const stated = raw.remote_type?.trim().toLowerCase();
  if (stated) {
    return stated;
  }
  if (raw.remote) {
    return 'remote';
  }
  if (raw.hybrid) {
    return 'hybrid';
  }
  return raw.remote === false ? 'on-site' : null;
}

const responseEnvelopeSchema = z.object({ data: z.array(z.unknown()) });

function toJobListing(raw: RawJob): JobListing {
  const seniority = raw.seniority?.toLowerCase();
  const minExperience = raw.min_experience
    ?? (seniority ? SENIORITY_MIN_YEARS[seniority] : undefined)
    ?? 0;

  const listing: JobListing = {
    id: raw.id,
    title: raw.job_title ?? raw.title ?? 'Untitled',
    requiredSkills: raw.required_skills ?? raw.technology_slugs ?? [],
    minExperience,
    source: {
      provider: 'theirstack',
      company: raw.company ?? null,
      url: raw.apply_url ?? raw.url ?? null,
      remote: raw.remote ?? null,
      remoteType: remoteType(raw),
      seniority: raw.seniority ?? null,
      datePosted: raw.date_posted ?? null,
      description: raw.description ?? null
    }
  };

  const location = raw.location ?? raw.short_location;
  if (location) {
    listing.location = location;
  }

  if (raw.min_annual_salary != null || raw.max_annual_salary != null) {
    listing.compensation = {
      min: raw.min_annual_salary ?? undefined,
      max: raw.max_annual_salary ?? undefined,
      currency: raw.salary_currency ?? undefined
    };
  }

  return listing;
}

function parseResponseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.error('Job search returned a body that is not JSON', { error, detail: text.slice(0, 200) });
    throw new AppError('Job search returned an invalid response', 502);
  }
}

/** Accepts a bare array or a `{ data: [...] }` envelope. */
export function mapSearchResponse(body: unknown): JobListing[] {
  let items: unknown[] | null = null;
  if (Array.isArray(body)) {
    items = body;
  } else {
    const envelope = responseEnvelopeSchema.safeParse(body);
    if (envelope.success) {
      items = envelope.data.data;
    }
  }

  if (!items) {
    logger.warn('Job search response had no job list');
    return [];
  }

  const listings: JobListing[] = [];
  const seenIds = new Set<string>();
  items.forEach((item, index) => {
    const parsed = rawJobSchema.safeParse(item);
    if (!parsed.success) {
      logger.warn('Dropping job listing without a usable id', { index });
      return;
    }
    if (seenIds.has(parsed.data.id)) {
      logger.warn('Dropping duplicate job listing', { index, jobId: parsed.data.id });
      return;
    }
    seenIds.add(parsed.data.id);
    listings.push(toJobListing(parsed.data));
  });

  return listings;
}

export class TheirStackJobSource implements JobSource {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TheirStackOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async searchJobs(preferences: SearchPreferences, analysis?: ResumeAnalysis | null): Promise<JobListing[]> {
    const query = formatSearchQuery(preferences, analysis);
    logger.debug('Sending job search query', { query });

    const body = await this.post(query, async response => {
      const text = await response.text();
      if (!response.ok) {
        logger.error('Job search API error', { status: response.status, detail: text.slice(0, 500) });
        throw new AppError(`Job search failed with status ${response.status}`, 502);
      }
      return parseResponseBody(text);
    });

    const listings = mapSearchResponse(body);
    logger.info('Job search completed', { count: listings.length });
    return listings;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      return await this.post({ posted_at_max_age_days: 30 }, async response => {
        if (response.ok) {
          return { success: true, message: 'API connection successful' };
        }
        const detail = await response.text().catch(() => '');
        return { success: false, message: `API Error: ${response.status} - ${detail}` };
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Connection error: ${message}` };
    }
  }

  /**
   * Sends the query and hands the response to `read`. The timeout covers the
   * body as well as the headers.
   */
  private async post<T>(query: TheirStackQuery, read: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(new AppError('Job search timed out', 504)), { once: true });
    });
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    const exchange = async (): Promise<T> => {
      const response = await this.fetchImpl(`${this.options.baseUrl}/jobs/search`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(query),
        signal: controller.signal
      });
      return read(response);
    };

    try {
      return await Promise.race([exchange(), timedOut]);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new AppError('Job search timed out', 504);
      }
      logger.error('Job search request failed', error);
      throw new AppError('Job search service unavailable, try again later', 502);
    } finally {
      clearTimeout(timeout);
    }
  }
}
