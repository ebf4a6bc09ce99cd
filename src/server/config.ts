import { LogLevel, parseLogLevel } from '../shared/logger';
import { createInvalidConfigError } from '../shared/errors';

export const DEFAULT_PORT = 4444;
export const DEFAULT_STATUS_PORT = 8080;
export const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:8080'];

export interface ServerConfig {
  port: number;
  host: string;
  /** null when the status API is switched off */
  statusPort: number | null;
  allowedOrigins: string[];
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parsePort(setting: string, value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw createInvalidConfigError(setting, value);
  }
  return port;
}

/**
 * Resolve configuration from CLI arguments (after the script path) and the environment
 *
 * The game port comes from the first argument, then PORT.
 */
export function loadConfig(args: readonly string[], env: Env): ServerConfig {
  const portArg = args[0] ?? env.PORT;
  const statusArg = env.STATUS_PORT?.trim();

  return {
    port: portArg === undefined ? DEFAULT_PORT : parsePort('port', portArg),
    host: env.HOST?.trim() || '0.0.0.0',
    statusPort:
      statusArg === 'off' ? null : statusArg ? parsePort('STATUS_PORT', statusArg) : DEFAULT_STATUS_PORT,
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0)
      : DEFAULT_ALLOWED_ORIGINS,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
