import { afterEach, describe, it, expect, vi } from 'vitest';
import { validateEnv } from '../../src/config/env';

describe('validateEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults for unset numbers', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('JOB_SEARCH_TIMEOUT_MS', '');
    vi.stubEnv('SESSION_TTL_MINUTES', '');

    expect(validateEnv()).toMatchObject({ PORT: 3000, JOB_SEARCH_TIMEOUT_MS: 30000, SESSION_TTL_MINUTES: 60 });
  });

  it('reads numeric settings', () => {
    vi.stubEnv('PORT', '8080');
    vi.stubEnv('SESSION_TTL_MINUTES', '15');

    expect(validateEnv()).toMatchObject({ PORT: 8080, SESSION_TTL_MINUTES: 15 });
  });

  it('rejects a timeout that is not a number', () => {
    vi.stubEnv('JOB_SEARCH_TIMEOUT_MS', 'soon');

    expect(() => validateEnv()).toThrow('Environment variable JOB_SEARCH_TIMEOUT_MS must be a number, got "soon"');
  });

  it('rejects a session TTL that is not a positive integer', () => {
    vi.stubEnv('SESSION_TTL_MINUTES', '-5');

    expect(() => validateEnv()).toThrow('Environment variable SESSION_TTL_MINUTES must be a positive integer, got "-5"');
  });
});
