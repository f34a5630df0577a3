/**
 * API Middleware — actor identity and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { EngineError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

/** Extended request carrying the acting identity. */
export interface ActorRequest extends Request {
  actorId?: string;
}

export const ANONYMOUS_ACTOR = 'anonymous';

/** Read the acting identity from the x-actor-id header. */
export function actorMiddleware() {
  return (req: ActorRequest, _res: Response, next: NextFunction) => {
    const header = req.headers['x-actor-id'];
    const value = Array.isArray(header) ? header[0] : header;
    req.actorId = value && value.trim() !== '' ? value.trim() : ANONYMOUS_ACTOR;
    next();
  };
}

export function actorOf(req: ActorRequest): string {
  return req.actorId ?? ANONYMOUS_ACTOR;
}

/** Send a thrown value as a typed error response. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof EngineError) {
    const status = getHttpStatus(err.typedError);
    if (status >= 500) {
      logger.error('Request error', { code: err.typedError.code, status, error: err.typedError.message });
    } else {
      logger.warn('Request error', { code: err.typedError.code, status });
    }
    res.status(status).json(apiError(err.typedError));
    return;
  }

  logger.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: err instanceof Error ? err.message : 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    res.status(400).json(
      apiError(createTypedError({ code: 'VALIDATION.PARSE', message: 'Request body is not valid JSON' })),
    );
    return;
  }
  sendError(res, err);
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

const CONFLICT_CODES = new Set([
  'JUDGMENT.ALREADY_DECIDED',
  'JUDGMENT.NOT_PENDING',
  'EXECUTION.ALREADY_TERMINAL',
  'PIPELINE.VERSION_CONFLICT',
  'CUTOVER.LOCKED',
]);

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'JUDGMENT.UNAUTHORIZED') return 403;
  if (CONFLICT_CODES.has(error.code)) return 409;
  if (error.code.startsWith('VALIDATION.') || error.code === 'JUDGMENT.INVALID_DECISION') return 400;
  if (error.code.startsWith('ROLLBACK.')) return 502;
  return 500;
}
