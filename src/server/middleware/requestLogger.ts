/**
 * Querywise - Request Logging Middleware
 * Logs each response with its status and duration
 */

import type { Request, Response, NextFunction } from 'express';

import { getClientIp } from '../../utils/helpers.js';
import { logRequest } from '../../utils/logger.js';

export interface RequestLoggerOptions {
  /** Skip logging for certain paths (e.g., health checks) */
  skipPaths?: string[];
}

export function requestLogger(
  options: RequestLoggerOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  const { skipPaths = ['/health'] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.startsWith(path))) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();

    res.on('finish', () => {
      logRequest({
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers),
        userAgent: req.headers['user-agent'],
      });
    });

    next();
  };
}

export default requestLogger;
