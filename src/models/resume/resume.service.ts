import type { CandidateProfile } from '../../interfaces/domain/CandidateProfile';
import type { ResumeAnalysis } from '../../interfaces/domain/ResumeAnalysis';
import type { SessionContext } from '../../interfaces/domain/SessionContext';
import type { CandidateProfileDto } from '../../interfaces/dto/CandidateProfileDto';
import { parseFile } from '../../utils/textParser';
import type { UploadedFile } from '../../utils/textParser';
import { toCandidateProfile } from '../../utils/resumeAnalyzer';
import type { ResumeAnalyzer } from '../../utils/resumeAnalyzer';
import type { SessionStore } from '../session/session.store';
import { AppError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';

export class ResumeService {
  constructor(
    private readonly analyzer: ResumeAnalyzer,
    private readonly sessions: SessionStore
  ) {}

  async analyzeUpload(session: SessionContext, file: UploadedFile): Promise<{
    analysis: ResumeAnalysis;
    profile: CandidateProfile;
  }> {
    const resumeText = await parseFile(file);
    const analysis = await this.analyzer.analyzeResume(resumeText);

    session.analysis = analysis;
    session.profile = toCandidateProfile(analysis, session.preferences);
    this.sessions.save(session);

    logger.info('Analyzed resume', {
      sessionId: session.id,
      filename: file.originalname,
      skillCount: analysis.technicalSkills.length
    });

    return { analysis, profile: session.profile };
  }

  getProfile(session: SessionContext): CandidateProfile {
    if (!session.profile) {
      throw new AppError('No candidate profile in session', 404);
    }
    return session.profile;
  }

  /** A hand-set profile replaces whatever the resume analysis produced. */
  setProfile(session: SessionContext, dto: CandidateProfileDto): CandidateProfile {
    session.analysis = null;
    session.profile = dto;
    this.sessions.save(session);
    logger.info('Set candidate profile manually', { sessionId: session.id });
    return dto;
  }
}
