import winston from 'winston';

export interface LoggerOptions {
  level: string;
  nodeEnv: string;
  service?: string;
}

const devFormat = winston.format.printf(({ level, message, timestamp, service, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${service}] ${level}: ${message}${extra}`;
});

/**
 * JSON lines in production, one readable line elsewhere. Silent under Jest.
 * Every entry carries the service name so CLI and server logs can be told apart.
 */
export function createAppLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.nodeEnv === 'test',
    defaultMeta: { service: options.service ?? 'nba-card' },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      options.nodeEnv === 'production' ? winston.format.json() : devFormat
    ),
    transports: [new winston.transports.Console()],
  });
}

export const logger = createAppLogger({
  level: process.env.LOG_LEVEL || 'info',
  nodeEnv: process.env.NODE_ENV || 'development',
});
