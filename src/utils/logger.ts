import winston from 'winston';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Custom log format for development (human-readable)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    // Filter out Symbol properties that Winston adds
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

// Determine log level from environment
const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  if (process.env['NODE_ENV'] === 'test') {
    return 'error';
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

// Determine log format from environment
const getLogFormat = (): winston.Logform.Format => {
  const format = process.env['LOG_FORMAT'];
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

// Create transports array
const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    const logFilePath = process.env['LOG_FILE_PATH'] ?? './logs/querywise.log';

    transports.push(
      new winston.transports.File({
        filename: logFilePath,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      })
    );

    transports.push(
      new winston.transports.File({
        filename: logFilePath.replace('.log', '.error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
        tailable: true,
      })
    );
  }

  return transports;
};

const logger = winston.createLogger({
  level: getLogLevel(),
  format: getLogFormat(),
  transports: getTransports(),
  exitOnError: false,
});

// Request logger for HTTP requests
export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  ipAddress?: string;
  userAgent?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// Pipeline stage logger
export type PipelineStage =
  | 'pii'
  | 'rewrite'
  | 'classify'
  | 'retrieve'
  | 'generate'
  | 'validate'
  | 'execute'
  | 'correct'
  | 'summarize';

export interface PipelineLogData {
  requestId?: string;
  conversationId?: string;
  stage: PipelineStage;
  durationMs?: number;
  outcome?: string;
  error?: string;
  [key: string]: unknown;
}

export const logPipeline = (data: PipelineLogData): void => {
  const level = data.error ? 'warn' : 'debug';

  logger.log(level, `Pipeline ${data.stage}${data.outcome ? `: ${data.outcome}` : ''}`, {
    type: 'pipeline',
    ...data,
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

export default logger;
