export type SkillMatchMode = 'exact' | 'normalized';

export interface ScoringConfig {
  skillWeight: number;
  experienceWeight: number;
  locationWeight: number;
  skillMatchMode: SkillMatchMode;
}
