import { LoggingWinston } from '@google-cloud/logging-winston';
import { LoggerOptions, createLogger, format, transports } from 'winston';

type Transports = Extract<NonNullable<LoggerOptions['transports']>, unknown[]>;

/**
 * Console always; a JSON file outside tests; Cloud Logging when LOG_TO_CLOUD
 * is set, which is how logs leave a Confidential Space VM.
 */
export function createTransports(env: NodeJS.ProcessEnv = process.env): Transports {
  const list: Transports = [new transports.Console()];
  if (env.NODE_ENV !== 'test') {
    list.push(
      new transports.File({
        filename: env.LOG_FILE || 'enclave-chat.log',
        format: format.combine(format.timestamp(), format.json()),
      })
    );
  }
  if (env.LOG_TO_CLOUD === 'true') {
    list.push(
      new LoggingWinston({
        logName: env.CLOUD_LOG_NAME || 'enclave-chat',
        projectId: env.PROJECT_ID || undefined,
      })
    );
  }
  return list;
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  defaultMeta: { component: 'enclave-chat' },
  format: format.combine(
    format.timestamp({ format: 'HH:mm:ss' }),
    format.colorize(),
    format.printf(({ timestamp, level, message }) => `${timestamp} ${level}: ${message}`)
  ),
  transports: createTransports(),
});
