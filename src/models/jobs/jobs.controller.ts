import type { Request, Response, NextFunction } from 'express';
import type { JobsService } from './jobs.service';
import { searchPreferencesSchema } from '../../interfaces/dto/SearchPreferencesDto';

export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  async searchJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const preferences = searchPreferencesSchema.parse(req.body);

      const result = await this.jobsService.searchJobs(req.sessionContext, preferences);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async getSourceStatus(req: Request, res: Response, next: NextFunction) {
    try {
      const status = await this.jobsService.testConnection();

      res.status(status.success ? 200 : 502).json(status);
    } catch (error) {
      next(error);
    }
  }
}
