import { PremiumErrorCode, ValidationError } from '../types/premium.types';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

export class PremiumError extends ApiError {
  constructor(
    public code: PremiumErrorCode,
    statusCode: number,
    message: string,
    public errors?: ValidationError[]
  ) {
    super(statusCode, message);
    Object.setPrototypeOf(this, PremiumError.prototype);
  }

  static internal(): PremiumError {
    return new PremiumError(PremiumErrorCode.INTERNAL_SERVER, 500, 'Internal server error');
  }

  static invalidInput(errors?: ValidationError[]): PremiumError {
    return new PremiumError(PremiumErrorCode.INVALID_INPUT, 400, 'Invalid request', errors);
  }

  static invalidHeader(header: string): PremiumError {
    return new PremiumError(PremiumErrorCode.INVALID_HEADER, 415, `Header ${header} not provided or invalid`);
  }

  static riskCalculation(): PremiumError {
    return new PremiumError(PremiumErrorCode.RISK_CALCULATION, 422, 'Cannot calculate risk for input');
  }
}

/** Raised when the rate matrix workbook cannot be read or is malformed. */
export class PremiumTableError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, PremiumTableError.prototype);
  }
}
