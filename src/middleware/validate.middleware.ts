import { Request, Response, NextFunction } from 'express';
import { ValidationChain, validationResult } from 'express-validator';
import { PremiumError } from '../utils/errors';
import { ValidationError } from '../types/premium.types';

export const requireJsonContent = (req: Request, res: Response, next: NextFunction): void => {
  if (!req.is('application/json')) {
    next(PremiumError.invalidHeader('content-type'));
    return;
  }
  next();
};

// Validation middleware
export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      for (const validation of validations) {
        await validation.run(req);
      }
    } catch (error) {
      next(error);
      return;
    }

    const result = validationResult(req);
    if (!result.isEmpty()) {
      const errors: ValidationError[] = result.array({ onlyFirstError: true }).map((error) => ({
        field: error.type === 'field' ? error.path : error.type,
        message: String(error.msg),
      }));
      next(PremiumError.invalidInput(errors));
      return;
    }
    next();
  };
};
