import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { isMutationStreamError } from '../../mapping/errors.js';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const ERROR_NAMES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

function getErrorName(statusCode: number): string {
  return ERROR_NAMES[statusCode] ?? 'Error';
}

function toApiError(error: FastifyError): ApiError {
  if (isMutationStreamError(error)) {
    return {
      statusCode: error.statusCode,
      error: getErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details }),
    };
  }
  const statusCode = error.statusCode ?? 500;
  return {
    statusCode,
    error: getErrorName(statusCode),
    message: error.message,
    ...(error.code ? { code: error.code } : {}),
  };
}

/**
 * Error handler of the non-GraphQL routes. GraphQL errors never reach it;
 * Mercurius formats them through the error formatter.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const response = toApiError(error);
  const { statusCode, code } = response;

  if (statusCode >= 500) {
    request.log.error({ err: error, method: request.method, url: request.url, statusCode }, 'Internal server error');
  } else {
    request.log.warn({ method: request.method, url: request.url, statusCode, code }, error.message);
  }

  reply.status(statusCode).send(response);
}
