import { config } from 'dotenv';

// Load environment variables once
config();

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface EnvironmentConfig {
  NODE_ENV: NodeEnv;
  LOG_LEVEL: LogLevel;
  // Ledger persistence (optional)
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
  // Default configuration file for the CLI
  TRADE_BOT_CONFIG_PATH?: string;
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

class EnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvironmentError';
  }
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}

function validateNodeEnv(value: string | undefined): NodeEnv {
  if (!value) {
    return 'development';
  }

  if (!isOneOf(NODE_ENVS, value)) {
    throw new EnvironmentError(
      `NODE_ENV must be one of: ${NODE_ENVS.join(', ')}. Got: ${value}`
    );
  }

  return value;
}

function validateLogLevel(value: string | undefined, nodeEnv: NodeEnv): LogLevel {
  if (!value) {
    return nodeEnv === 'test' ? 'silent' : 'info';
  }

  if (!isOneOf(LOG_LEVELS, value)) {
    throw new EnvironmentError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${value}`
    );
  }

  return value;
}

function validateSupabaseUrl(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }

  try {
    new URL(value);
  } catch {
    throw new EnvironmentError(
      `SUPABASE_URL must be a valid URL. Got: ${value}`
    );
  }

  return value;
}

function validateSupabaseKey(value: string | undefined, keyName: string): string | undefined {
  if (!value) {
    return undefined;
  }

  if (value.length < 10) {
    throw new EnvironmentError(`${keyName} appears to be invalid (too short)`);
  }

  return value;
}

function validateOptionalString(value: string | undefined): string | undefined {
  return value || undefined;
}

let environmentConfig: EnvironmentConfig | null = null;

export function getEnvironmentConfig(): EnvironmentConfig {
  if (environmentConfig) {
    return environmentConfig;
  }

  const nodeEnv = validateNodeEnv(process.env['NODE_ENV']);

  environmentConfig = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: validateLogLevel(process.env['LOG_LEVEL'], nodeEnv),
    SUPABASE_URL: validateSupabaseUrl(process.env['SUPABASE_URL']),
    SUPABASE_SERVICE_ROLE_KEY: validateSupabaseKey(
      process.env['SUPABASE_SERVICE_ROLE_KEY'],
      'SUPABASE_SERVICE_ROLE_KEY'
    ),
    TRADE_BOT_CONFIG_PATH: validateOptionalString(process.env['TRADE_BOT_CONFIG_PATH']),
  };

  return environmentConfig;
}

/**
 * Drop the cached configuration so the next call re-reads process.env.
 */
export function resetEnvironmentConfig(): void {
  environmentConfig = null;
}

export { EnvironmentError };
