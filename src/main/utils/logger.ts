import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

const logDir = process.env.BYTETRICKLE_LOG_DIR;

const logger = winston.createLogger({
  level: process.env.BYTETRICKLE_LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [],
});

if (logDir) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }));
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'combined.log') }));
}

if (process.env.NODE_ENV !== 'production' || !logDir) {
  logger.add(new winston.transports.Console({ format: winston.format.simple() }));
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export { logger };
