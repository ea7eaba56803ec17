import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import onHeaders from 'on-headers';
import type { Telemetry } from '../services/telemetry/types';

export const REQUEST_ID_HEADER = 'X-Request-Id';
export const PROCESS_TIME_HEADER = 'X-Process-Time';

function millisecondsSince(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1e6;
}

export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : 'unknown';
}

/**
 * Assigns a request id, stamps the processing time on the response and
 * records a request telemetry item once the response has been written.
 */
export function requestContext(telemetry: Telemetry): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = process.hrtime.bigint();

    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    // seconds, set just before the headers go out
    onHeaders(res, () => {
      res.setHeader(PROCESS_TIME_HEADER, (millisecondsSince(startedAt) / 1000).toFixed(4));
    });

    res.on('finish', () => {
      const durationMs = millisecondsSince(startedAt);
      const [path] = req.originalUrl.split('?');
      telemetry.record({
        type: 'request',
        name: `${req.method} ${path}`,
        url: req.originalUrl,
        statusCode: res.statusCode,
        durationMs
      });
    });

    next();
  };
}
