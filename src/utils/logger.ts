import path from 'node:path';
import pino from 'pino';

export const LOG_FILE_NAME = 'workflow-settings.log';

const isDev = process.env.NODE_ENV !== 'production';

function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (process.env.NODE_ENV === 'test' || level === 'silent') {
    return pino({ level: 'silent' });
  }

  // In development, use pino-pretty transport for nice console output.
  if (isDev) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  // Production: stdout plus a file under LOG_PATH, which the log file routes serve
  const streams: pino.StreamEntry[] = [{ stream: process.stdout }];

  const logPath = process.env.LOG_PATH || './logs';
  streams.push({
    stream: pino.destination({ dest: path.join(logPath, LOG_FILE_NAME), mkdir: true, sync: false }),
  });

  return pino({ level }, pino.multistream(streams));
}

export const logger = createLogger();

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
