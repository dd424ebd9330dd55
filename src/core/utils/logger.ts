import pino, { type Logger } from 'pino';

// Resolve the desired log level once, in order of preference:
// 1. Explicit LOG_LEVEL env var
// 2. DEBUG env var (any truthy value enables "debug")
// 3. Fallback to the default "info" level
const logLevel = process.env.LOG_LEVEL ?? (process.env.DEBUG ? 'debug' : 'info');

const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
  level: logLevel,
  base: { service: 'groundwork' },
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,service',
          translateTime: 'SYS:standard',
          destination: 2,
        },
      }
    : undefined,
});

export type { Logger };

/**
 * Child logger tagged with the component that owns it.
 */
export function getLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

export default logger;
