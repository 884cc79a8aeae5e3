/**
 * Querywise - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';

/**
 * Reuses an inbound X-Request-ID header when present, otherwise generates a
 * UUID. The id is echoed back on the response.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof existingId === 'string' && existingId.length > 0
        ? existingId
        : Array.isArray(existingId) && existingId[0]
          ? existingId[0]
          : uuidv4();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
