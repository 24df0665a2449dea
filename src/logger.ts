import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { APP_NAME, APP_VERSION, config } from './config';

// Check for --debug flag in command line arguments
const debugMode = process.argv.includes('--debug');
const logLevel = debugMode ? 'debug' : (process.env.LOG_LEVEL || 'info');
const isTest = process.env.NODE_ENV === 'test';
const isDevelopment = process.env.NODE_ENV !== 'production';

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: APP_NAME,
    version: APP_VERSION
  },
  transports: [
    // Console output with color in development (silent under Jest)
    new winston.transports.Console({
      silent: isTest,
      format: isDevelopment
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, service, version, ...meta }) => {
              let metaStr = '';
              if (Object.keys(meta).length) {
                const formattedMeta = { ...meta };

                // Stack traces go to the log files only
                delete formattedMeta.stack;

                metaStr = ` ${JSON.stringify(formattedMeta, null, 0)}`;
              }
              return `${timestamp} [${level}]: ${message}${metaStr}`;
            })
          )
        : winston.format.json()
    })
  ]
});

if (!isTest) {
  if (!fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  // File output for errors
  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'error.log'),
    level: 'error',
    format: winston.format.json()
  }));

  // File output for all logs
  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'combined.log'),
    format: winston.format.json()
  }));
}

export default logger;
