import winston from 'winston';

export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
});

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize({ level: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${extra}${trace}`;
  })
);

/**
 * Process-wide logger. The level starts from LOG_LEVEL and is set again
 * from the validated config once the server boots; output is silenced
 * under NODE_ENV=test.
 */
export const logger = winston.createLogger({
  levels: LOG_LEVELS,
  level: process.env.LOG_LEVEL ?? 'info',
  format,
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === 'test',
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
