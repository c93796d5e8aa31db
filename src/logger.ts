import winston, { Logger } from 'winston';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return winston.createLogger({
    level,
    transports: [new winston.transports.Console({ format: winston.format.simple() })],
  });
}

export const logger: Logger = createLogger();
