import { Response } from 'express';
import { ApiResponse, ValidationError } from '../types/premium.types';
import { PremiumError } from './errors';

export const sendSuccess = <T>(res: Response, data: T, message?: string, statusCode = 200) => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
  };
  res.status(statusCode).json(response);
};

export const sendError = (
  res: Response,
  message: string,
  statusCode = 500,
  errors?: ValidationError[]
) => {
  const response: ApiResponse = {
    success: false,
    message,
    errors,
  };
  res.status(statusCode).json(response);
};

export const sendPremiumError = (res: Response, error: PremiumError) => {
  const response: ApiResponse = {
    success: false,
    code: error.code,
    message: error.message,
    errors: error.errors,
  };
  res.status(error.statusCode).json(response);
};
