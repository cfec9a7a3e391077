import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { PremiumService } from '../services/premium.service';
import { PremiumRequest } from '../types/premium.types';
import { sendSuccess } from '../utils/response';
import logger from '../utils/logger';

export class PremiumController {
  constructor(private premiumService: PremiumService) {}

  async calculate(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const request = matchedData<PremiumRequest>(req, { locations: ['body'] });
      const quote = await this.premiumService.calculate(request);

      logger.debug('Premium calculated', { ...quote });
      sendSuccess(res, quote);
    } catch (error) {
      next(error);
    }
  }

  async load(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const summary = await this.premiumService.load();
      sendSuccess(res, summary, 'Premium tables loaded');
    } catch (error) {
      next(error);
    }
  }

  async unload(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const summary = await this.premiumService.unload();
      sendSuccess(res, summary, 'Premium tables unloaded');
    } catch (error) {
      next(error);
    }
  }

  async check(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = await this.premiumService.status();
      sendSuccess(res, status);
    } catch (error) {
      next(error);
    }
  }
}
