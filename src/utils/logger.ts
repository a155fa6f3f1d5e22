import pino, { type LoggerOptions } from 'pino';
import { config } from '../config.js';

// Credentials this service holds: the OpenAI key and read-only database URLs
const REDACTED_PATHS = [
  'apiKey',
  '*.apiKey',
  'openai.apiKey',
  'connectionUrl',
  '*.connectionUrl',
  'readonlyUrl',
  '*.readonlyUrl',
  'connections',
  '*.connections',
  'req.headers.authorization',
];

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino/file',
          options: { destination: 1 },
        }
      : undefined,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: 'query-analyst' },
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  serializers: {
    req(req) {
      return {
        method: req.method,
        url: req.url,
        hostname: req.hostname,
        remoteAddress: req.ip,
      };
    },
    res(res) {
      return {
        statusCode: res.statusCode,
      };
    },
  },
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
