import winston from 'winston';
import path from 'path';
import fs from 'fs';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
});

// "2024-01-01 12:00:00:000 info [claims]: message"
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const component = typeof info.component === 'string' ? ` [${info.component}]` : '';
    return `${info.timestamp} ${info.level}${component}: ${info.message}`;
  }),
);

const transports: winston.transport[] = [new winston.transports.Console()];

// File logs only when a log directory is configured
const logDir = process.env.LOG_DIR;
if (logDir) {
  fs.mkdirSync(logDir, { recursive: true });
  transports.push(
    new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(logDir, 'distribution.log') }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels,
  format,
  transports,
  silent: process.env.NODE_ENV === 'test',
});

/**
 * Logger that tags every line with the component name.
 */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
