import type { Request, Response, NextFunction } from 'express';
import type { ResumeService } from './resume.service';
import { candidateProfileSchema } from '../../interfaces/dto/CandidateProfileDto';
import { AppError } from '../../utils/errorHandler';

export class ResumeController {
  constructor(private readonly resumeService: ResumeService) {}

  async uploadResume(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.file) {
        throw new AppError('resumeFile is required', 400);
      }

      const result = await this.resumeService.analyzeUpload(req.sessionContext, req.file);

      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  }

  async getProfile(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(this.resumeService.getProfile(req.sessionContext));
    } catch (error) {
      next(error);
    }
  }

  async putProfile(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = candidateProfileSchema.parse(req.body);

      const result = this.resumeService.setProfile(req.sessionContext, dto);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
