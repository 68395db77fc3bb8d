export interface ErrorDetail {
  field: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: ErrorDetail[],
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: ErrorDetail[],
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

/** Thrown when thresholds, weights or vocabulary tables cannot be loaded. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super('CONFIGURATION_ERROR', message, 500, details);
    this.name = 'ConfigurationError';
  }
}
