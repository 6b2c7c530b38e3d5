/**
 * Shared Response Helpers
 *
 * Factory for service-specific helpers producing the
 * `{ success, data | error, timestamp }` envelope.
 *
 * Usage:
 *   const { sendSuccess, sendCreated, ServiceErrors } = createResponseHelpers('my-service');
 */

import type { Response } from 'express';
import { ZodError } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors';
import { getCorrelationContext } from '../logging/correlation';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ErrorBody {
  success: false;
  error: {
    type: string;
    code: string;
    message: string;
    service: string;
    correlationId?: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
}

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;
  badRequest: (res: Response, message: string, req?: RequestWithHeaders, details?: Record<string, unknown>) => void;
  unauthorized: (res: Response, message?: string, req?: RequestWithHeaders) => void;
  notFound: (res: Response, resource: string, req?: RequestWithHeaders) => void;
  internal: (res: Response, message: string, originalError?: unknown, req?: RequestWithHeaders) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  sendCreated: <T>(res: Response, data: T) => void;
  ServiceErrors: ServiceErrorHelpers;
}

const STATUS_TYPES: Record<number, string> = {
  400: 'ValidationError',
  401: 'UnauthorizedError',
  404: 'NotFoundError',
  409: 'ConflictError',
  502: 'ExternalServiceError',
  503: 'ServiceUnavailableError',
};

export function getCorrelationId(req?: RequestWithHeaders): string | undefined {
  const header = req?.headers['x-correlation-id'] ?? req?.headers['x-request-id'];
  if (typeof header === 'string' && header.length > 0) return header;
  return getCorrelationContext()?.correlationId;
}

function createSendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json({
    success: true,
    data,
    timestamp: new Date().toISOString(),
  });
}

function createSendCreated<T>(res: Response, data: T): void {
  createSendSuccess(res, data, 201);
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const logger = getLogger(`${serviceName}:responses`);

  const send = (
    res: Response,
    statusCode: number,
    code: string,
    message: string,
    req?: RequestWithHeaders,
    details?: Record<string, unknown>
  ): void => {
    const body: ErrorBody = {
      success: false,
      error: {
        type: STATUS_TYPES[statusCode] ?? 'InternalError',
        code,
        message,
        service: serviceName,
        correlationId: getCorrelationId(req),
        ...(details && { details }),
      },
      timestamp: new Date().toISOString(),
    };
    res.status(statusCode).json(body);
  };

  const internal = (res: Response, message: string, originalError?: unknown, req?: RequestWithHeaders): void => {
    logger.error(message, { error: serializeError(originalError), correlationId: getCorrelationId(req) });
    send(res, 500, DomainErrorCode.INTERNAL_ERROR, message, req);
  };

  return {
    fromException: (res, error, fallbackMessage, req) => {
      if (error instanceof ZodError) {
        send(res, 400, DomainErrorCode.VALIDATION_ERROR, 'Invalid request', req, {
          issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
        });
        return;
      }
      if (error instanceof DomainError && error.statusCode < 500) {
        send(res, error.statusCode, error.code ?? DomainErrorCode.UNKNOWN, error.message, req, error.details);
        return;
      }
      internal(res, fallbackMessage, error, req);
    },

    badRequest: (res, message, req, details) => {
      send(res, 400, DomainErrorCode.VALIDATION_ERROR, message, req, details);
    },

    unauthorized: (res, message = 'Unauthorized', req) => {
      send(res, 401, 'UNAUTHORIZED', message, req);
    },

    notFound: (res, resource, req) => {
      send(res, 404, DomainErrorCode.NOT_FOUND, `${resource} not found`, req);
    },

    internal,
  };
}

/**
 * Create response helpers for a specific service
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess: createSendSuccess,
    sendCreated: createSendCreated,
    ServiceErrors: createServiceErrors(serviceName),
  };
}
