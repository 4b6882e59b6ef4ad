import pino from 'pino';
import { loadConfig, type Config } from './config.js';

export type Logger = pino.Logger;

// Temporary credentials must never reach the logs, wherever they are nested
const REDACTED_PATHS = [
  'secretAccessKey',
  'sessionToken',
  '*.secretAccessKey',
  '*.sessionToken',
  '*.credentials.secretAccessKey',
  '*.credentials.sessionToken',
];

let loggerInstance: pino.Logger | null = null;

export function createLogger(
  config: Pick<Config, 'logLevel' | 'nodeEnv' | 'functionName'>,
  destination?: pino.DestinationStream
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: 'unzip-relay', functionName: config.functionName },
    redact: REDACTED_PATHS,
  };

  if (destination) {
    return pino(options, destination);
  }

  return pino({
    ...options,
    transport:
      config.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger(loadConfig());
  }
  return loggerInstance;
}
