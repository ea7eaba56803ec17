import { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import { AppError, InferenceUnavailableError } from '../errors';
import type { BackgroundTasks } from '../services/background';
import type { Telemetry } from '../services/telemetry/types';
import logger from '../utils/logger';
import { getRequestId } from './requestContext';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    request_id: string;
    details?: unknown;
  };
}

function sendError(res: Response, status: number, error: Omit<ErrorResponse['error'], 'request_id'>) {
  const body: ErrorResponse = { error: { ...error, request_id: getRequestId(res) } };
  res.status(status).json(body);
}

interface ClientErrorDescription {
  code: string;
  message: string;
}

// body-parser failure types
const REQUEST_BODY_ERRORS = new Map<string, ClientErrorDescription>([
  ['entity.parse.failed', { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }],
  ['entity.too.large', { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' }],
  ['charset.unsupported', { code: 'UNSUPPORTED_CHARSET', message: 'Request body charset is not supported' }],
  ['encoding.unsupported', { code: 'UNSUPPORTED_ENCODING', message: 'Request body encoding is not supported' }]
]);

const MALFORMED_REQUEST: ClientErrorDescription = { code: 'BAD_REQUEST', message: 'Malformed request' };

/** http-errors shape: a 4xx `status` plus a string `type` */
function isClientHttpError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, res: Response) => {
    sendError(res, 404, { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` });
  };
}

/**
 * Final error middleware. Known errors map to their status and code; the rest
 * become a generic 500 so internals never reach the client.
 */
export function errorHandler(telemetry: Telemetry, background: BackgroundTasks): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestId = getRequestId(res);

    if (err instanceof AppError) {
      if (err instanceof InferenceUnavailableError) {
        const reason = err.cause instanceof Error ? err.cause.message : err.message;
        logger.error({ requestId, path: req.path, reason }, 'Inference call failed');
        background.schedule('telemetry:exception', () =>
          telemetry.record({
            type: 'exception',
            kind: err.name,
            message: reason,
            properties: { request_id: requestId, path: req.path }
          })
        );
      } else {
        logger.info({ requestId, path: req.path, code: err.code }, 'Request rejected');
      }

      sendError(res, err.status, { code: err.code, message: err.message, details: err.details });
      return;
    }

    if (isClientHttpError(err)) {
      const description = REQUEST_BODY_ERRORS.get(err.type) ?? MALFORMED_REQUEST;
      logger.info({ requestId, path: req.path, type: err.type, status: err.status }, 'Request rejected');
      sendError(res, err.status, description);
      return;
    }

    logger.error({ err, requestId, path: req.path }, 'Unhandled error');
    background.schedule('telemetry:exception', () =>
      telemetry.record({
        type: 'exception',
        kind: err instanceof Error ? err.name : 'UnknownError',
        message: err instanceof Error ? err.message : String(err),
        properties: { request_id: requestId, path: req.path }
      })
    );
    sendError(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
  };
}
