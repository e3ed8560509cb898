import { ApiError, ERRORS, isErrorCode } from '@fxhub/domain';
import { log } from '@fxhub/observability';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

export function errorEnvelope(request: Pick<FastifyRequest, 'id'>, code: string, message: string, details?: unknown): ErrorBody {
  const error: ErrorBody['error'] = {
    code,
    message,
    requestId: request.id
  };

  if (details !== undefined) {
    error.details = details;
  }

  return { error };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  code: string;
  message: string;
  status?: number;
  details?: unknown;
}): FastifyReply {
  return params.reply.status(params.status ?? 400).send(errorEnvelope(params.request, params.code, params.message, params.details));
}

/**
 * Map anything thrown by a handler onto an `ApiError`. Errors carrying a
 * registered `code` keep their message; Fastify's own 4xx errors become
 * INVALID_PAYLOAD; everything else is INTERNAL_ERROR.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string' && isErrorCode(error.code)) {
      return new ApiError(ERRORS[error.code], undefined, error.message);
    }

    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return new ApiError(ERRORS.INVALID_PAYLOAD, undefined, error.message);
    }
  }

  return new ApiError(ERRORS.INTERNAL_ERROR);
}

export function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown): FastifyReply {
  const apiError = toApiError(error);
  return deny({
    request,
    reply,
    code: apiError.code,
    message: apiError.message,
    status: apiError.status,
    details: apiError.details
  });
}

export function registerErrorHandler(app: FastifyInstance, serviceName: string): void {
  app.setErrorHandler((error, request, reply) => {
    const apiError = toApiError(error);

    if (apiError.status >= 500) {
      log('error', `${serviceName} request failed`, {
        code: apiError.code,
        message: error.message,
        stack: error.stack,
        requestId: request.id
      });
    }

    sendError(request, reply, apiError);
  });

  app.setNotFoundHandler((request, reply) => {
    deny({ request, reply, code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found.`, status: 404 });
  });
}
