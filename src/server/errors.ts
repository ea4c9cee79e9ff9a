import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ScriptGenerationError } from '../generator/errors.js';
import { ManifestValidationError } from '../manifest/schema.js';
import { ComponentNotFoundError, ComponentValidationError } from '../store/errors.js';
import { formatIssues } from '../utils/error-utils.js';
import type { ErrorResponse } from './types.js';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Map an error thrown by a handler to a status code and `{ error }` body.
 */
export function toErrorResponse(error: FastifyError | Error): { statusCode: number; body: ErrorResponse } {
  if (error instanceof HttpError) {
    return { statusCode: error.statusCode, body: { error: error.message } };
  }
  if (error instanceof ZodError) {
    return { statusCode: 400, body: { error: formatIssues(error.issues).join('; ') } };
  }
  if (
    ComponentValidationError.isComponentValidationError(error) ||
    ScriptGenerationError.isScriptGenerationError(error) ||
    error instanceof ManifestValidationError
  ) {
    return { statusCode: 400, body: { error: error.message } };
  }
  if (ComponentNotFoundError.isComponentNotFoundError(error)) {
    return { statusCode: 404, body: { error: error.message } };
  }
  // Fastify's own client errors (malformed JSON, wrong content type)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return { statusCode: error.statusCode, body: { error: error.message } };
  }
  return { statusCode: 500, body: { error: error.message } };
}

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): void {
  const { statusCode, body } = toErrorResponse(error);
  if (statusCode >= 500) {
    request.log.error(error);
  }
  reply.status(statusCode).send(body);
}
