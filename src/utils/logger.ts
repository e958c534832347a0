import winston from 'winston';

// Reports go to stdout, so every log level is routed to stderr.
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.splat()
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: logFormat,
  defaultMeta: {
    service: 'secret-expiry-monitor'
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, stack, service: _service, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${stack || message}${metaStr}`;
        })
      )
    })
  ]
});

export default logger;
