import winston from 'winston';

const { combine, timestamp, errors, json } = winston.format;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(errors({ stack: true }), timestamp(), json()),
  defaultMeta: { service: 'peer-review-dashboard' },
  transports: [new winston.transports.Console()],
  // vitest sets NODE_ENV=test
  silent: process.env.NODE_ENV === 'test',
});
