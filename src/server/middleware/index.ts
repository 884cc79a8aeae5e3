/**
 * Querywise - HTTP Middleware
 */

export * from './errorHandler.js';
export * from './requestId.js';
export * from './requestLogger.js';
