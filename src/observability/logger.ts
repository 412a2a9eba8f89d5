import { pino, type BaseLogger, type Logger, type LevelWithSilent } from 'pino';

/**
 * Logging surface taken by the pipeline components. Both a pino logger and
 * Fastify's `request.log`/`fastify.log` children satisfy it.
 */
export type ComponentLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error' | 'fatal'>;

export interface LoggerOptions {
  /** Logger name written into every line */
  name?: string;

  /** Minimal level (default: LOG_LEVEL env variable, then 'info') */
  level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFromEnv(): LevelWithSilent | undefined {
  const raw = process.env['LOG_LEVEL'];
  return LEVELS.find((level) => level === raw);
}

/**
 * Standalone pino logger for components used outside the server. Inside the
 * server, components get children of Fastify's request-aware logger instead.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? levelFromEnv() ?? 'info',
    ...(options.name !== undefined && { name: options.name }),
  });
}
