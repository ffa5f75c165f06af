import pino, { type LoggerOptions } from 'pino';
import { config } from '../config.js';

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  base: { service: 'customer-module' },
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
  // Failure logs carry the submitted customer; its contact details are masked.
  redact: ['customer.email', 'customer.phone', 'customer.address', 'customer.taxId'],
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
