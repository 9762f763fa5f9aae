import OpenAI from 'openai';
import { z } from 'zod';
import type { CandidateProfile } from '../interfaces/domain/CandidateProfile';
import type { ResumeAnalysis } from '../interfaces/domain/ResumeAnalysis';
import type { SearchPreferences } from '../interfaces/domain/SearchPreferences';
import { AppError } from './errorHandler';
import { logger } from './logger';

export interface ResumeAnalyzer {
  analyzeResume(resumeText: string): Promise<ResumeAnalysis>;
}

export interface PromptMessage {
  role: 'system' | 'user';
  content: string;
}

/** Minimal chat-completion capability, so the analyzer can run against a stub. */
export interface CompletionClient {
  complete(messages: PromptMessage[]): Promise<string | null>;
}

const MAX_DOCUMENT_CHARS = 12000;
const MAX_MODEL_RETRIES = 1;
const MAX_LIST_ITEMS = 40;

const SYSTEM_PROMPT = `You are an expert resume analyzer. Extract the following information from the resume:
1. Technical skills
2. Soft skills
3. Years of experience
4. Education
5. Key achievements

Return the analysis in this JSON format:
{
  "technical_skills": [],
  "soft_skills": [],
  "years_experience": number,
  "education": [],
  "achievements": [],
  "seniority_level": "entry" | "mid" | "senior"
}`;

function buildUserPrompt(resumeText: string, attempt: number): string {
  const retryNotice = attempt > 0
    ? 'IMPORTANT: Your previous response was not valid JSON in the requested format. Respond with the JSON object only, no commentary.\n\n'
    : '';

  return `${retryNotice}Resume text:
"""
${truncateForPrompt(resumeText)}
"""`;
}

function truncateForPrompt(text: string): string {
  if (text.length <= MAX_DOCUMENT_CHARS) {
    return text;
  }
  return text.slice(0, MAX_DOCUMENT_CHARS);
}

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform(items => items
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0)
    .slice(0, MAX_LIST_ITEMS));

const analysisResponseSchema = z.object({
  technical_skills: stringList,
  soft_skills: stringList.optional(),
  years_experience: z.coerce.number().finite().nonnegative().catch(0),
  education: stringList.optional(),
  achievements: stringList.optional(),
  seniority_level: z
    .string()
    .transform(level => level.toLowerCase().trim())
    .pipe(z.enum(['entry', 'mid', 'senior']))
    .nullable()
    .optional()
    .catch(null)
});

/** Pulls the JSON object out of a model reply, tolerating a fenced code block. */
function extractJson(content: string): unknown {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : content;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON object in model response');
  }
  return JSON.parse(body.slice(start, end + 1));
}

export function parseAnalysisResponse(content: string): ResumeAnalysis {
  const parsed = analysisResponseSchema.parse(extractJson(content));
  return {
    technicalSkills: dedupe(parsed.technical_skills),
    softSkills: dedupe(parsed.soft_skills ?? []),
    yearsExperience: parsed.years_experience,
    education: parsed.education ?? [],
    achievements: parsed.achievements ?? [],
    seniorityLevel: parsed.seniority_level ?? null
  };
}

function dedupe(skills: string[]): string[] {
  const seen = new Set<string>();
  return skills.filter(skill => {
    const key = skill.toLowerCase();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

export class LlmResumeAnalyzer implements ResumeAnalyzer {
  constructor(private readonly client: CompletionClient) {}

  async analyzeResume(resumeText: string): Promise<ResumeAnalysis> {
    const trimmed = resumeText.trim();
    if (!trimmed) {
      throw new AppError('Resume text is empty', 422);
    }
    return this.requestAnalysis(trimmed, 0);
  }

  private async requestAnalysis(resumeText: string, attempt: number): Promise<ResumeAnalysis> {
    let content: string | null;
    try {
      content = await this.client.complete([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(resumeText, attempt) }
      ]);
    } catch (error) {
      logger.error('Resume analysis request failed', error);
      throw new AppError('LLM service unavailable, try again later', 502);
    }

    try {
      if (!content) {
        throw new Error('Resume analysis model returned empty response');
      }
      return parseAnalysisResponse(content);
    } catch (error) {
      logger.error('Failed to parse resume analysis response', { error, attempt });
      if (attempt < MAX_MODEL_RETRIES) {
        return this.requestAnalysis(resumeText, attempt + 1);
      }
      throw new AppError('Unable to parse resume analysis response', 502);
    }
  }
}

export function createOpenAICompletionClient(apiKey: string, model: string): CompletionClient {
  const openai = new OpenAI({ apiKey });

  return {
    async complete(messages) {
      const completion = await openai.chat.completions.create({
        model,
        messages,
        temperature: 0,
        max_tokens: 2000
      });
      return completion.choices[0]?.message?.content ?? null;
    }
  };
}

/**
 * Builds the matching profile from an analysis. Technical skills are the
 * ones matched against listings; the search title and location become the
 * candidate's preferences.
 */
export function toCandidateProfile(
  analysis: ResumeAnalysis,
  preferences?: Pick<SearchPreferences, 'title' | 'location'> | null
): CandidateProfile {
  const title = preferences?.title?.trim();
  const location = preferences?.location?.trim();

  return {
    skills: analysis.technicalSkills,
    yearsExperience: analysis.yearsExperience,
    desiredTitles: title ? [title] : [],
    desiredLocations: location ? [location] : []
  };
}
