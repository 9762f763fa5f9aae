import { describe, it, expect } from 'vitest';
import type { CandidateProfile } from '../../src/interfaces/domain/CandidateProfile';
import type { JobListing } from '../../src/interfaces/domain/JobListing';
import type { ScoringConfig } from '../../src/interfaces/domain/ScoringConfig';
import { normalizeSkillName, rank, rankDetailed, score } from '../../src/utils/matchScorer';
import { DEFAULT_SCORING_CONFIG } from '../../src/utils/scoringConfig';
import { InvalidConfigError, InvalidInputError } from '../../src/utils/errorHandler';

const config: ScoringConfig = { ...DEFAULT_SCORING_CONFIG };

const candidate: CandidateProfile = {
  skills: ['TypeScript', 'Node.js', 'PostgreSQL'],
  yearsExperience: 4,
  desiredTitles: ['Backend Engineer'],
  desiredLocations: ['Berlin']
};

const job: JobListing = {
  id: 'job-1',
  title: 'Senior Backend Engineer',
  requiredSkills: ['typescript', 'node.js', 'Kubernetes'],
  minExperience: 5,
  location: 'berlin ',
  source: { provider: 'test' }
};

describe('normalizeSkillName', () => {
  it('lower-cases, folds punctuation and keeps language suffixes attached', () => {
    expect(normalizeSkillName('  Node.JS ')).toBe('node.js');
    expect(normalizeSkillName('C #')).toBe('c#');
    expect(normalizeSkillName('CI/CD  Pipelines!')).toBe('ci/cd pipelines');
  });
});

describe('score', () => {
  it('combines skill, experience and location contributions', () => {
    const result = score(candidate, job, config);

    expect(result.jobId).toBe('job-1');
    expect(result.score).toBe(75);
    expect(result.matchedSkills).toEqual(['typescript', 'node.js']);
    expect(result.missingSkills).toEqual(['Kubernetes']);

    const [skills, experience, location] = result.breakdown;
    expect(result.breakdown.map(entry => entry.name)).toEqual(['skills', 'experience', 'location']);
    expect(skills.contribution).toBeCloseTo(40, 9);
    expect(skills.detail).toBe('Matches 2/3 required skills');
    expect(experience.factor).toBeCloseTo(0.8, 9);
    expect(experience.contribution).toBeCloseTo(20, 9);
    expect(experience.detail).toBe('4 years against 5 required');
    expect(location.contribution).toBeCloseTo(15, 9);
    expect(location.detail).toBe('berlin  is a desired location');
  });

  it('has breakdown entries that sum to the unrounded score', () => {
    const result = score(candidate, { ...job, minExperience: 7 }, config);
    const total = result.breakdown.reduce((sum, entry) => sum + entry.contribution, 0);

    expect(total).toBeCloseTo(40 + (4 / 7) * 25 + 15, 9);
    expect(result.score).toBe(Math.round(total));
  });

  it('compares skills verbatim in exact mode', () => {
    const result = score(candidate, job, { ...config, skillMatchMode: 'exact' });

    expect(result.matchedSkills).toEqual([]);
    expect(result.breakdown[0].contribution).toBe(0);
    expect(result.score).toBe(35);
  });

  it('counts required skills that normalize to the same name once', () => {
    const result = score(candidate, { ...job, requiredSkills: ['TypeScript', 'typescript ', 'Go'] }, config);

    expect(result.matchedSkills).toEqual(['TypeScript']);
    expect(result.missingSkills).toEqual(['Go']);
    expect(result.breakdown[0].factor).toBe(0.5);
  });

  it('gives no skill credit when the job lists no required skills', () => {
    const result = score(candidate, { ...job, requiredSkills: [] }, config);

    expect(result.breakdown[0].contribution).toBe(0);
    expect(result.breakdown[0].detail).toBe('No required skills listed');
    expect(result.score).toBe(35);
  });

  it('gives full experience credit when the job states no minimum', () => {
    const result = score({ ...candidate, yearsExperience: 0 }, { ...job, minExperience: undefined }, config);

    expect(result.breakdown[1].factor).toBe(1);
  });

  it('uses a floor of one year for partial experience credit', () => {
    const result = score({ ...candidate, yearsExperience: 0.2 }, { ...job, minExperience: 0.5 }, config);

    expect(result.breakdown[1].factor).toBeCloseTo(0.2, 9);
  });

  it('treats an empty desired location list as any location', () => {
    const anywhere = { ...candidate, desiredLocations: [] };

    for (const location of ['Berlin', 'Remote', 'São Paulo', undefined]) {
      const result = score(anywhere, { ...job, location }, config);
      expect(result.breakdown[2].factor).toBe(1);
      expect(result.breakdown[2].detail).toBe('Any location accepted');
    }
  });

  it('gives no location credit outside the desired locations', () => {
    expect(score(candidate, { ...job, location: 'Munich' }, config).breakdown[2]).toMatchObject({
      factor: 0,
      contribution: 0,
      detail: 'Munich is not a desired location'
    });
    expect(score(candidate, { ...job, location: undefined }, config).breakdown[2].detail)
      .toBe('Job location not specified');
  });

  it('is deterministic', () => {
    expect(score(candidate, job, config)).toEqual(score(candidate, job, config));
  });

  it('never lowers the score when a required skill is added to the candidate', () => {
    const before = score(candidate, job, config);
    const after = score({ ...candidate, skills: [...candidate.skills, 'Kubernetes'] }, job, config);

    expect(after.score).toBeGreaterThanOrEqual(before.score);
    expect(after.score).toBe(95);
  });

  it('keeps the score within 0 and 100', () => {
    const configs: ScoringConfig[] = [
      config,
      { skillWeight: 1, experienceWeight: 0, locationWeight: 0, skillMatchMode: 'normalized' },
      { skillWeight: 0.3334, experienceWeight: 0.3333, locationWeight: 0.3338, skillMatchMode: 'exact' }
    ];
    const jobs: JobListing[] = [
      job,
      { id: 'all', title: 'All', requiredSkills: ['TypeScript', 'Node.js', 'PostgreSQL'], location: 'Berlin' },
      { id: 'none', title: 'None', requiredSkills: ['Rust'], minExperience: 30, location: 'Oslo' }
    ];

    for (const scoringConfig of configs) {
      for (const listing of jobs) {
        const result = score(candidate, listing, scoringConfig);
        expect(result.score).toBeGreaterThanOrEqual(0);
        expect(result.score).toBeLessThanOrEqual(100);
      }
    }
  });

  it('rejects a candidate without skills', () => {
    expect(() => score({ ...candidate, skills: [] }, job, config)).toThrow(InvalidInputError);
    expect(() => score({ ...candidate, skills: ['  '] }, job, config)).toThrow(
      'Candidate profile must list at least one skill'
    );
  });

  it('rejects skills that normalize to nothing, unless matching exactly', () => {
    const punctuationOnly = { ...candidate, skills: ['!!!', '--'] };

    expect(() => score(punctuationOnly, job, { ...config, skillMatchMode: 'normalized' })).toThrow(
      'Candidate profile must list at least one skill'
    );
    expect(() => rank(punctuationOnly, [job], { ...config, skillMatchMode: 'normalized' })).toThrow(InvalidInputError);
    expect(score(punctuationOnly, job, { ...config, skillMatchMode: 'exact' }).jobId).toBe(job.id);
  });

  it('rejects negative experience and jobs without an id', () => {
    expect(() => score({ ...candidate, yearsExperience: -1 }, job, config)).toThrow(InvalidInputError);
    expect(() => score(candidate, { ...job, id: '' }, config)).toThrow('Job listing is missing an id');
  });

  it('rejects weights that sum to 0.9', () => {
    const bad: ScoringConfig = { ...config, skillWeight: 0.5 };

    expect(() => score(candidate, job, bad)).toThrow(InvalidConfigError);
    expect(() => score(candidate, job, bad)).toThrow('Scoring weights must sum to 1.0, got 0.9');
  });

  it('rejects a negative weight even when the sum is 1.0', () => {
    const bad: ScoringConfig = { skillWeight: 1.2, experienceWeight: -0.2, locationWeight: 0, skillMatchMode: 'normalized' };

    expect(() => score(candidate, job, bad)).toThrow(InvalidConfigError);
  });
});

describe('rank', () => {
  const generalist: CandidateProfile = {
    skills: ['a', 'b', 'c', 'd', 'e'],
    yearsExperience: 5,
    desiredTitles: [],
    desiredLocations: []
  };

  const j1: JobListing = { id: 'J1', title: 'One', requiredSkills: ['a', 'b', 'x'], minExperience: 2 };
  const j2: JobListing = { id: 'J2', title: 'Two', requiredSkills: ['c', 'd', 'y'], minExperience: 2 };
  const j3: JobListing = { id: 'J3', title: 'Three', requiredSkills: ['a', 'b', 'c', 'd', 'e', 'z'] };

  it('orders by descending score and keeps input order on ties', () => {
    const results = rank(generalist, [j1, j2, j3], config);

    expect(results.map(result => result.jobId)).toEqual(['J3', 'J1', 'J2']);
    expect(results.map(result => result.score)).toEqual([90, 80, 80]);
  });

  it('keeps tie order when the input order changes', () => {
    expect(rank(generalist, [j2, j3, j1], config).map(result => result.jobId)).toEqual(['J3', 'J2', 'J1']);
  });

  it('returns an empty list for no jobs', () => {
    expect(rank(generalist, [], config)).toEqual([]);
  });

  it('skips malformed listings and reports them', () => {
    const broken: JobListing = { id: '', title: 'Broken', requiredSkills: ['a'] };
    const negative: JobListing = { id: 'neg', title: 'Negative', requiredSkills: ['a'], minExperience: -2 };

    const ranked = rankDetailed(generalist, [j1, broken, j3, negative], config);

    expect(ranked.results.map(result => result.jobId)).toEqual(['J3', 'J1']);
    expect(ranked.skipped).toEqual([
      { index: 1, jobId: null, reason: 'Job listing is missing an id' },
      { index: 3, jobId: 'neg', reason: 'Job listing neg has an invalid minimum experience' }
    ]);
  });

  it('fails the whole call for an invalid candidate or config', () => {
    expect(() => rank({ ...generalist, skills: [] }, [j1], config)).toThrow(InvalidInputError);
    expect(() => rank(generalist, [j1], { ...config, locationWeight: 0.5 })).toThrow(InvalidConfigError);
  });
});
