import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

import { env } from '../config/index.js';

const redactPaths: string[] = [
  'cardNumber',
  'rsaPublicKeyHex',
  'key',
  'request.cardNumber',
  'request.rsaPublicKeyHex',
  '*.cardNumber',
  '*.key'
];

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

/**
 * Build a logger; a destination replaces the pretty transport
 */
export function createLogger(destination?: DestinationStream, level: string = env.LOG_LEVEL): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      app: 'card-envelope-crypto',
      env: env.NODE_ENV
    },
    redact: {
      paths: redactPaths,
      remove: true
    }
  };

  if (destination) {
    return pino(options, destination);
  }
  return pino({ ...options, transport });
}

export const logger = createLogger();
