import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'storefront-cart' },
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
