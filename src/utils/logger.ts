import winston from 'winston';
import config from './config.js';

/**
 * Custom log format combining timestamp and message.
 * Format: `YYYY-MM-DDTHH:mm:ss.sssZ [LEVEL]: message`
 */
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

/**
 * Console output goes to stderr for every level so that stdout only carries
 * search results and can be piped.
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

if (config.logger.file) {
  transports.push(new winston.transports.File({ filename: config.logger.file }));
}

/**
 * Application logger instance configured with timestamped format.
 * The log level is determined by the configuration (defaulting to 'info').
 */
const logger = winston.createLogger({
  level: config.logger.level,
  format: logFormat,
  transports,
});

export default logger;
