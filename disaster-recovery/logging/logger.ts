// DR Control Plane Logger

import winston, { type Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  environment?: string;
  service?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const environment = options.environment ?? 'production';

  return winston.createLogger({
    level: options.level ?? (environment === 'development' ? 'debug' : 'info'),
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: {
      service: options.service ?? 'dr-control-plane',
      environment,
    },
    transports: [new winston.transports.Console()],
  });
}

export type { Logger };
