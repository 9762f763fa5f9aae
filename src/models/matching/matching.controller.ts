import type { Request, Response, NextFunction } from 'express';
import type { MatchingService } from './matching.service';
import { matchFilterSchema, rankRequestSchema, scoreRequestSchema } from '../../interfaces/dto/MatchRequestDto';

export class MatchingController {
  constructor(private readonly matchingService: MatchingService) {}

  async getSessionMatches(req: Request, res: Response, next: NextFunction) {
    try {
      const filter = matchFilterSchema.parse(req.query);

      const result = this.matchingService.sessionMatches(req.sessionContext, filter);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async scoreJob(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = scoreRequestSchema.parse(req.body);

      const result = this.matchingService.scoreOne(dto);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async rankJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = rankRequestSchema.parse(req.body);

      const result = this.matchingService.rankListings(dto);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
