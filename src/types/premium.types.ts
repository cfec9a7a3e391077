export interface PremiumRequest {
  code: string;
  sumInsured: string;
  dateOfBirth: string;
}

export interface PremiumQuote {
  code: string;
  sumInsured: string;
  age: number;
  ageBand: number;
  premium: string;
  calculatedAt: string;
}

/**
 * One rate of the matrix: the premium charged for a product code and sum
 * insured in a given age band.
 */
export interface PremiumTableEntry {
  code: string;
  sumInsured: string;
  band: number;
  premium: string;
}

export interface LoadSummary {
  keys: number;
  entries: number;
}

export interface UnloadSummary {
  deleted: number;
}

export interface TableStatus {
  loaded: boolean;
  keys: number;
}

export enum PremiumErrorCode {
  INTERNAL_SERVER = '001',
  INVALID_INPUT = '002',
  INVALID_HEADER = '003',
  RISK_CALCULATION = '004',
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  code?: PremiumErrorCode;
  errors?: ValidationError[];
}

export interface ValidationError {
  field: string;
  message: string;
}
