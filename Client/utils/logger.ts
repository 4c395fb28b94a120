import winston from 'winston';

const logFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
});

// Diagnostics only; what the user reads at the prompt is printed by the CLI.
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      ),
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
  exitOnError: false,
});
