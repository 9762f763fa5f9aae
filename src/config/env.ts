import dotenv from 'dotenv';

dotenv.config();

interface EnvConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  THEIRSTACK_API_KEY: string;
  THEIRSTACK_API_URL: string;
  JOB_SEARCH_TIMEOUT_MS: number;
  SESSION_TTL_MINUTES: number;
  SCORING_SKILL_WEIGHT?: number;
  SCORING_EXPERIENCE_WEIGHT?: number;
  SCORING_LOCATION_WEIGHT?: number;
  SCORING_SKILL_MATCH_MODE?: string;
}

function requireVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

function positiveInteger(name: string, fallback: number): number {
  const value = optionalNumber(name) ?? fallback;
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${process.env[name]}"`);
  }
  return value;
}

export function validateEnv(): EnvConfig {
  return {
    PORT: positiveInteger('PORT', 3000),
    NODE_ENV: process.env.NODE_ENV || 'development',
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
    OPENAI_API_KEY: requireVar('OPENAI_API_KEY'),
    OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    THEIRSTACK_API_KEY: requireVar('THEIRSTACK_API_KEY'),
    THEIRSTACK_API_URL: process.env.THEIRSTACK_API_URL || 'https://api.theirstack.com',
    JOB_SEARCH_TIMEOUT_MS: positiveInteger('JOB_SEARCH_TIMEOUT_MS', 30000),
    SESSION_TTL_MINUTES: positiveInteger('SESSION_TTL_MINUTES', 60),
    SCORING_SKILL_WEIGHT: optionalNumber('SCORING_SKILL_WEIGHT'),
    SCORING_EXPERIENCE_WEIGHT: optionalNumber('SCORING_EXPERIENCE_WEIGHT'),
    SCORING_LOCATION_WEIGHT: optionalNumber('SCORING_LOCATION_WEIGHT'),
    SCORING_SKILL_MATCH_MODE: process.env.SCORING_SKILL_MATCH_MODE || undefined
  };
}

export const env = validateEnv();
