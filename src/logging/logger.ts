/**
 * Bridge Logger
 * Wrapper around Winston for application logging
 */

import winston from 'winston';
import type { LoggingConfig } from '../config/schema';
import type { Logger } from './types';

// Pretty format for terminals: "12:00:01 [info] [Poller]: Polling 3 enabled devices {...}"
const prettyFormat = winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
  const prefix = typeof component === 'string' ? `[${component}] ` : '';
  const relevantMeta = Object.keys(meta).filter(key => key !== 'service');
  const metaStr = relevantMeta.length > 0
    ? ' ' + JSON.stringify(Object.fromEntries(relevantMeta.map(key => [key, meta[key]])))
    : '';

  return `${timestamp} [${level}]: ${prefix}${message}${metaStr}`;
});

/**
 * Create the root logger from the logging section of the configuration
 */
export function createLogger(config: LoggingConfig): winston.Logger {
  const logger = winston.createLogger({
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: { service: 'bacnet-mqtt-bridge' },
    transports: [
      new winston.transports.Console({
        format: config.format === 'pretty'
          ? winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'HH:mm:ss' }),
            prettyFormat
          )
          : winston.format.json()
      })
    ]
  });

  if (config.file) {
    logger.add(new winston.transports.File({
      filename: config.file,
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }));
  }

  return logger;
}
