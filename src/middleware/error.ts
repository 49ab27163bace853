import { Request, Response, NextFunction } from 'express';
import type { Logger } from '../utils/logger.js';

/**
 * Error response envelope, same shape Microsoft Graph uses
 */
export interface RelayErrorResponse {
  error: {
    code: string;
    message: string;
    innerError?: {
      date: string;
      'request-id': string;
    };
  };
}

/**
 * How callers should react to a failure
 */
export type ErrorKind =
  | 'transient'
  | 'unauthorized'
  | 'providerRejected'
  | 'permanentDeliveryFailure'
  | 'invalidRequest'
  | 'notFound'
  | 'internal';

export interface RelayErrorOptions {
  retryAfterMs?: number;
  cause?: unknown;
}

/**
 * Error carrying an HTTP status, a Graph-style code and a recovery kind
 */
export class RelayError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly retryAfterMs?: number;

  constructor(
    statusCode: number,
    code: string,
    kind: ErrorKind,
    message: string,
    options: RelayErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RelayError';
    this.statusCode = statusCode;
    this.code = code;
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Network fault, 5xx, 429 or a full queue; safe to retry
   */
  static transient(message: string, options: RelayErrorOptions = {}): RelayError {
    return new RelayError(503, 'serviceUnavailable', 'transient', message, options);
  }

  static unauthorized(message: string = 'Unauthorized', options: RelayErrorOptions = {}): RelayError {
    return new RelayError(401, 'unauthenticated', 'unauthorized', message, options);
  }

  /**
   * The provider refused the request; a configuration or permission defect
   */
  static providerRejected(
    message: string,
    statusCode: number = 400,
    options: RelayErrorOptions = {}
  ): RelayError {
    return new RelayError(statusCode, 'providerRejected', 'providerRejected', message, options);
  }

  static permanentDeliveryFailure(message: string, options: RelayErrorOptions = {}): RelayError {
    return new RelayError(502, 'deliveryFailed', 'permanentDeliveryFailure', message, options);
  }

  static badRequest(message: string = 'Invalid request'): RelayError {
    return new RelayError(400, 'invalidRequest', 'invalidRequest', message);
  }

  static notFound(message: string = 'Resource not found'): RelayError {
    return new RelayError(404, 'itemNotFound', 'notFound', message);
  }

  static internal(message: string = 'Internal server error'): RelayError {
    return new RelayError(500, 'internalServerError', 'internal', message);
  }

  toJSON(): RelayErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        innerError: {
          date: new Date().toISOString(),
          'request-id': generateRequestId()
        }
      }
    };
  }
}

export function isRelayError(error: unknown, kind?: ErrorKind): error is RelayError {
  return error instanceof RelayError && (kind === undefined || error.kind === kind);
}

export function isTransient(error: unknown): boolean {
  return isRelayError(error, 'transient');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Express error handling middleware
 * Converts errors to the Graph error envelope
 */
export function createErrorHandler(logger: Logger) {
  return (err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      return next(err);
    }

    if (err instanceof RelayError) {
      if (err.retryAfterMs !== undefined) {
        res.setHeader('Retry-After', String(Math.ceil(err.retryAfterMs / 1000)));
      }
      res.status(err.statusCode).json(err.toJSON());
      return;
    }

    // body-parser reports malformed JSON with 400, oversized bodies with 413
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      const rejected = new RelayError(err.status, 'invalidRequest', 'invalidRequest', err.message);
      res.status(rejected.statusCode).json(rejected.toJSON());
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}: ${err.stack ?? err.message}`);
    const internal = RelayError.internal(err.message || 'An unexpected error occurred');
    res.status(internal.statusCode).json(internal.toJSON());
  };
}

/**
 * 404 Not Found handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = RelayError.notFound(`Cannot ${req.method} ${req.path}`);
  res.status(error.statusCode).json(error.toJSON());
}

function hasStatus(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number';
}
