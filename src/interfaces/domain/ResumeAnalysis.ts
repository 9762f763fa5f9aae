export type SeniorityLevel = 'entry' | 'mid' | 'senior';

export interface ResumeAnalysis {
  technicalSkills: string[];
  softSkills: string[];
  yearsExperience: number;
  education: string[];
  achievements: string[];
  seniorityLevel: SeniorityLevel | null;
}
