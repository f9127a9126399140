import type { Request, Response, NextFunction } from "express";
import { getLogger } from "./logger.js";
import type { QuotaResource } from "../types/quota.js";

/**
 * API Error class for standardized error handling
 */
export class APIError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public details: unknown;

  constructor(message: string, statusCode: number = 500, details: unknown = null) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export interface QuotaExceededDetails {
  tenantId: string;
  resource: QuotaResource;
  current: number;
  limit: number;
  requested: number;
  reason: string;
}

/**
 * A reservation was denied. Carries the counter state at the time of denial.
 */
export class QuotaExceededError extends APIError {
  declare details: QuotaExceededDetails;

  constructor(details: QuotaExceededDetails) {
    super(details.reason, 429, details);
    this.name = 'QuotaExceededError';
  }
}

/**
 * The external compute callback failed. Never cached; the reservation is rolled back.
 */
export class ComputeFailureError extends APIError {
  constructor(key: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Compute failed for cache key ${key}: ${message}`, 502, { key });
    this.name = 'ComputeFailureError';
    this.cause = cause;
  }
}

/**
 * Invalid configuration detected at startup. Prevents the scheduler (or server) from starting.
 */
export class ConfigurationError extends APIError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 500, { issues });
    this.name = 'ConfigurationError';
  }
}

function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError;
}

/**
 * Error handler middleware
 */
export function errorHandler(error: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isAPIError(error)) {
    res.status(error.statusCode).json({
      error: {
        message: error.message,
        details: error.details,
        statusCode: error.statusCode
      }
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({
      error: {
        message: 'Invalid JSON body',
        details: error.message,
        statusCode: 400
      }
    });
    return;
  }

  getLogger().error({ err: error, path: req.path }, 'Unexpected error');
  res.status(500).json({
    error: {
      message: 'Internal server error',
      details: error.message || 'An unexpected error occurred',
      statusCode: 500
    }
  });
}
